import express, { Express } from "express";
import cors from "cors";
import { AppConfig } from "./config";
import { PipelineDeps } from "./services/pipeline";
import { createRunsRouter } from "./routes/runs";

export function createApp(config: Readonly<AppConfig>, deps: PipelineDeps): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Mount routes
  app.use("/runs", createRunsRouter(deps, config.runApiKey));

  return app;
}
