import express from "express";
import healthRouter from "./routes/health.js";
import { createToolsRouter } from "./routes/tools.js";
import type { ToolContext } from "./tools/index.js";

export function createApp(context: ToolContext): express.Express {
  const app = express();

  app.use(express.json());

  app.get("/", (_req, res) => {
    res.json({
      name: "crm-query-engine",
      version: "0.1.0",
      description: "Schema-driven query and navigation tools over the Salesforce REST API",
    });
  });

  app.use("/health", healthRouter);
  app.use("/api/tools", createToolsRouter(context));

  return app;
}
