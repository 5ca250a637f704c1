// src/handlers/responsesHandler.ts
import type { Request, Response, RequestHandler } from "express";
import type { ServerConfig } from "../config.js";
import { buildResponseDocument, normalizeInput, type SynthesisInput } from "../responseDocument.js";
import { words } from "../story.js";

export type ResponsesRequest = Omit<SynthesisInput, "modelSuffix"> & {
  inputKind: "string" | "array" | "absent" | "other";
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function finiteNumber(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

function inputKindOf(input: unknown): ResponsesRequest["inputKind"] {
  if (input === undefined || input === null) return "absent";
  if (typeof input === "string") return "string";
  return Array.isArray(input) ? "array" : "other";
}

// Wrong-typed fields fall back to defaults; nothing here rejects a request.
export function parseResponsesRequest(body: unknown, defaultModel: string): ResponsesRequest {
  const b = isRecord(body) ? body : {};
  const model = typeof b.model === "string" && b.model ? b.model : defaultModel;

  return {
    model,
    inputText: normalizeInput(b.input),
    inputKind: inputKindOf(b.input),
    temperature: finiteNumber(b.temperature),
    topP: finiteNumber(b.top_p),
  };
}

export function createResponsesHandler(cfg: ServerConfig): RequestHandler {
  return (req: Request, res: Response) => {
    const parsed = parseResponsesRequest(req.body, cfg.defaultModel);
    console.log("[resp:req] model=%s input=%s words=%d",
      parsed.model, parsed.inputKind, words(parsed.inputText).length);

    res.status(200).json(buildResponseDocument({ ...parsed, modelSuffix: cfg.modelSuffix }));
  };
}
