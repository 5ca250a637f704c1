// src/handlers/cors.ts
import type { RequestHandler } from "express";

export function corsHeaders(appOrigin: string): RequestHandler {
  return (req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", appOrigin);
    res.setHeader("Vary", "Origin");
    res.setHeader("Access-Control-Allow-Headers", "authorization,content-type,x-request-id");
    res.setHeader("Access-Control-Allow-Methods", "GET,HEAD,POST,OPTIONS");

    if (req.method === "OPTIONS") { res.status(204).end(); return; }
    next();
  };
}
