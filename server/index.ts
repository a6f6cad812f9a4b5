import express, { type NextFunction, type Request, type Response } from "express";
import { getSettings } from "./config/settings";
import { configureLogger, logInfo } from "./utils/logger";
import { logError } from "./utils/errorHandler";
import { createOrchestrator } from "./orchestrator";
import { registerRoutes } from "./routes";

const settings = getSettings();
configureLogger({ level: settings.logLevel, logDir: settings.logDir });

const app = express();
app.use(express.json());

app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();
  res.on("finish", () => {
    if (req.path.startsWith("/api")) {
      logInfo(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
    }
  });
  next();
});

async function main(): Promise<void> {
  const orchestrator = createOrchestrator(settings);
  const server = await registerRoutes(app, orchestrator);
  server.listen(settings.port, () => {
    logInfo(`[Server] Listening on port ${settings.port}`, { model: settings.llmModel });
  });
}

main().catch((error: unknown) => {
  logError("Server", error);
  process.exit(1);
});
