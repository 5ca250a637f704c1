// src/app.ts
import express from "express";
import bodyParser from "body-parser";
import type { ServerConfig } from "./config.js";
import { corsHeaders } from "./handlers/cors.js";
import { createResponsesHandler } from "./handlers/responsesHandler.js";
import { errorHandler, notFound } from "./handlers/errors.js";
import { healthRoutes } from "./routes/health.js";

export function createApp(cfg: ServerConfig) {
  const app = express();
  app.disable("x-powered-by");

  // Root ping
  app.get("/", (_req, res) => res.status(200).json({ ok: true, msg: "responses-mock-server" }));

  // CORS runs before the body parser so preflights never touch JSON parsing
  app.use("/v1", corsHeaders(cfg.appOrigin));
  app.use(bodyParser.json({ limit: cfg.bodyLimit }));

  app.use("/v1/health", healthRoutes());
  app.post("/v1/responses", createResponsesHandler(cfg));

  app.use(notFound);
  app.use(errorHandler);
  return app;
}
