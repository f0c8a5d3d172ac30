#!/usr/bin/env tsx

/**
 * mailroute CLI
 *
 * Complexity-based email analysis routing from your terminal.
 *
 * Usage:
 *   mailroute score "text"                 Show complexity factors
 *   mailroute route "text" -t summary      Preview the fallback chain
 *   mailroute analyze "text" -t action_items --subject "Re: outage"
 *   mailroute digest emails.json           Daily summary of many emails
 *   mailroute providers                    List providers and bindings
 *   mailroute config set-key openai <key>  Store a provider API key
 */

import { Command } from "commander";
import { registerScoreCommand } from "./commands/score.js";
import { registerRouteCommand } from "./commands/route.js";
import { registerAnalyzeCommands } from "./commands/analyze.js";
import { registerProvidersCommand } from "./commands/providers.js";
import { registerConfigCommands } from "./commands/config.js";

const program = new Command();

program
  .name("mailroute")
  .description("mailroute: route email analysis to the cheapest model that can handle it")
  .version("0.1.0");

registerScoreCommand(program);
registerRouteCommand(program);
registerAnalyzeCommands(program);
registerProvidersCommand(program);
registerConfigCommands(program);

await program.parseAsync();
