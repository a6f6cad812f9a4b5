/**
 * Ask one question from the command line and print the full result as JSON.
 *
 * Usage:
 *   npm run ask -- "How many calls did we have last week?" --company 42 [--session cli]
 */
import { parseArgs } from "node:util";
import { getSettings } from "../server/config/settings";
import { configureLogger } from "../server/utils/logger";
import { createOrchestrator } from "../server/orchestrator";
import { getErrorMessage } from "../server/utils/errorHandler";
import { companyIdSchema } from "@shared/schema";

async function ask() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      company: { type: "string", short: "c" },
      session: { type: "string", short: "s", default: "cli" },
    },
  });

  const question = positionals.join(" ").trim();
  const companyId = companyIdSchema.safeParse(values.company);
  if (!question || !companyId.success) {
    console.error('Usage: npm run ask -- "<question>" --company <id> [--session <id>]');
    process.exit(2);
  }

  const settings = getSettings();
  // Keep stdout clean for the JSON result.
  configureLogger({ level: "warn", logDir: settings.logDir });

  const orchestrator = createOrchestrator(settings);
  const result = await orchestrator.ask({
    text: question,
    tenantId: companyId.data,
    sessionId: values.session ?? "cli",
  });
  console.log(JSON.stringify(result, null, 2));
  process.exit(result.success ? 0 : 1);
}

ask().catch(error => {
  console.error("Fatal error:", getErrorMessage(error));
  process.exit(1);
});
