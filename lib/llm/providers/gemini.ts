import { GoogleGenAI } from "@google/genai";
import type { AnalysisProvider, CompletionOptions } from "../../providers/types";
import type { CompletionRequest, CompletionResult } from "../types";
import { toProviderError } from "../provider-error";
import { reportInfo } from "../../errors";

export class GeminiProvider implements AnalysisProvider {
  readonly name = "gemini" as const;
  private readonly client: GoogleGenAI;

  constructor(apiKey: string) {
    this.client = new GoogleGenAI({ apiKey });
  }

  async complete(
    request: CompletionRequest,
    options: CompletionOptions
  ): Promise<CompletionResult> {
    const startTime = Date.now();

    try {
      const result = await this.client.models.generateContent({
        model: request.model,
        contents: [{ role: "user", parts: [{ text: request.prompt }] }],
        config: {
          systemInstruction: request.system,
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens,
          abortSignal: options.signal,
          httpOptions: { timeout: options.timeoutMs },
        },
      });

      const firstCandidate = result.candidates?.[0];
      const text = (firstCandidate?.content?.parts ?? [])
        .map((part) => part.text ?? "")
        .join("");

      reportInfo("Gemini response", {
        context: "provider",
        provider: this.name,
        model: request.model,
        textLength: text.length,
        latencyMs: Date.now() - startTime,
        finishReason: firstCandidate?.finishReason,
      });

      const usage = result.usageMetadata;
      return {
        text,
        finishReason: firstCandidate?.finishReason || undefined,
        tokenUsage: usage
          ? {
              promptTokens: usage.promptTokenCount ?? 0,
              completionTokens: usage.candidatesTokenCount ?? 0,
              totalTokens: usage.totalTokenCount ?? 0,
            }
          : undefined,
      };
    } catch (err) {
      // ApiError carries the HTTP status; fetch failures fall through to Unavailable
      throw toProviderError(err, this.name);
    }
  }
}
