/**
 * Prompt templates per analysis type
 *
 * The selector passes the analysis type through untouched; this is where
 * it takes effect. Every template yields a system + user pair and its own
 * token budget, so adding a type means adding one entry here.
 */

import type { EmailInput, PromptKind } from "./types";

export const MAX_BODY_CHARS = 4000;
export const DIGEST_SNIPPET_CHARS = 200;

export interface PromptSpec {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

export interface PromptOptions {
  /** Used by "custom" */
  instructions?: string;
  /** Used by "draft_reply"; defaults to DEFAULT_REPLY_TONE */
  tone?: string;
}

export const DEFAULT_REPLY_TONE = "professional";

interface PromptTemplate {
  system: string;
  maxTokens: number;
  temperature: number;
  build: (body: string, options: PromptOptions) => string;
}

const TEMPLATES: Record<PromptKind, PromptTemplate> = {
  summary: {
    system: "You are a helpful email assistant that provides clear, concise summaries.",
    maxTokens: 500,
    temperature: 0.7,
    build: (body) =>
      [
        "Summarize the following email for a busy reader.",
        "",
        "Cover the sender's main point, any requests or questions, and any dates or deadlines.",
        "Keep it to a short paragraph followed by at most three bullet points.",
        "",
        "Email:",
        body,
      ].join("\n"),
  },

  action_items: {
    system: "You are an AI assistant that extracts actionable items from emails.",
    maxTokens: 300,
    temperature: 0.5,
    build: (body) =>
      [
        "Analyze this email and extract any actionable items or tasks the recipient needs to do.",
        "",
        "For each action item, provide:",
        "1. A clear, actionable description",
        "2. Priority level (high/medium/low)",
        "3. Any deadlines mentioned",
        "4. Type of action (reply, follow-up, task, meeting, etc.)",
        "",
        'If there are no clear action items, respond with "No action items found."',
        "",
        "Email:",
        body,
      ].join("\n"),
  },

  recommendations: {
    system: "You are an AI assistant that provides email response recommendations.",
    maxTokens: 400,
    temperature: 0.6,
    build: (body) =>
      [
        "Analyze this email and provide response recommendations for the recipient.",
        "",
        "Provide:",
        "1. Whether a response is needed (yes/no/maybe)",
        "2. Recommended tone (professional, friendly, formal, casual)",
        "3. Key points to address",
        "4. Questions that should be asked",
        "5. Recommended response time (immediate, within 24 hours, within a week)",
        "",
        "Email:",
        body,
      ].join("\n"),
  },

  custom: {
    system: "You are a helpful email assistant.",
    maxTokens: 800,
    temperature: 0.7,
    build: (body, { instructions }) =>
      instructions && instructions.trim().length > 0
        ? [instructions.trim(), "", "Email:", body].join("\n")
        : body,
  },

  draft_reply: {
    system: "You are an AI assistant that drafts email replies.",
    maxTokens: 300,
    temperature: 0.7,
    build: (body, { tone }) =>
      [
        `Write a ${tone?.trim() || DEFAULT_REPLY_TONE} reply to this email.`,
        "",
        "Requirements:",
        "1. Keep it concise",
        "2. Address the main points of the original email",
        "3. Match the tone to the context",
        "4. Include a greeting and a closing",
        "",
        "Email:",
        body,
      ].join("\n"),
  },

  sentiment: {
    system: "You are an AI assistant that analyzes email sentiment and tone.",
    maxTokens: 200,
    temperature: 0.3,
    build: (body) =>
      [
        "Analyze the sentiment and tone of this email.",
        "",
        "Provide:",
        "1. Overall sentiment (positive, negative, neutral)",
        "2. Tone (formal, informal, urgent, friendly, etc.)",
        "3. Emotional indicators",
        "4. Urgency level",
        "5. Professional or personal nature",
        "",
        "Email:",
        body,
      ].join("\n"),
  },

  daily_summary: {
    system: "You are a helpful email assistant that provides clear, actionable summaries.",
    maxTokens: 500,
    temperature: 0.7,
    build: (body) =>
      [
        "Analyze the following emails from today and provide a daily summary.",
        "",
        "Focus on:",
        "1. Overall email volume and patterns",
        "2. Key themes and topics",
        "3. Urgent matters that need attention",
        "4. Important deadlines or meetings",
        "",
        "Emails:",
        body,
      ].join("\n"),
  },
};

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/** Cap a raw email body at MAX_BODY_CHARS */
export function truncateBody(text: string): string {
  return truncate(text, MAX_BODY_CHARS);
}

/**
 * Render the email with its headers, as the model sees it.
 */
export function formatEmail(email: EmailInput): string {
  const lines: string[] = [];
  if (email.sender) lines.push(`From: ${email.sender}`);
  if (email.subject) lines.push(`Subject: ${email.subject}`);
  if (lines.length > 0) lines.push("");
  lines.push(truncateBody(email.content));
  return lines.join("\n");
}

/**
 * One block per email: sender, subject and a short snippet.
 */
export function formatDigest(emails: EmailInput[]): string {
  return emails
    .map((email, i) =>
      [
        `#${i + 1}`,
        `From: ${email.sender ?? "unknown"}`,
        `Subject: ${email.subject ?? "(no subject)"}`,
        `Snippet: ${truncate(email.content.replace(/\s+/g, " ").trim(), DIGEST_SNIPPET_CHARS)}`,
      ].join("\n")
    )
    .join("\n\n");
}

export function buildPrompt(kind: PromptKind, text: string, options: PromptOptions = {}): PromptSpec {
  const template = TEMPLATES[kind];
  return {
    system: template.system,
    prompt: template.build(text, options),
    maxTokens: template.maxTokens,
    temperature: template.temperature,
  };
}
