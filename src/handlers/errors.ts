// src/handlers/errors.ts
import type { ErrorRequestHandler, Request, Response } from "express";

export type ApiErrorBody = {
  error: {
    message: string;
    type: "invalid_request_error" | "server_error";
    code: string;
  };
};

export function apiError(type: ApiErrorBody["error"]["type"], code: string, message: string): ApiErrorBody {
  return { error: { message, type, code } };
}

// body-parser attaches `status` and `type` ("entity.parse.failed", "entity.too.large", ...)
function bodyParserFailure(err: unknown): { status: number; type: string } | null {
  if (typeof err !== "object" || err === null) return null;
  const status = "status" in err ? err.status : undefined;
  const type = "type" in err ? err.type : undefined;
  return typeof status === "number" && typeof type === "string" ? { status, type } : null;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function notFound(req: Request, res: Response) {
  res.status(404).json(apiError("invalid_request_error", "not_found",
    `No route for ${req.method} ${req.path}`));
}

export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const bp = bodyParserFailure(err);
  console.error("[http:error]", { path: req.path, method: req.method, type: bp?.type, message: messageOf(err) });

  if (bp?.type === "entity.parse.failed") {
    res.status(400).json(apiError("invalid_request_error", "invalid_json",
      "We could not parse the JSON body of your request."));
    return;
  }
  if (bp?.type === "entity.too.large") {
    res.status(413).json(apiError("invalid_request_error", "payload_too_large",
      "Request body exceeds the configured limit."));
    return;
  }
  if (bp && bp.status >= 400 && bp.status < 500) {
    res.status(bp.status).json(apiError("invalid_request_error", bp.type, messageOf(err)));
    return;
  }

  res.status(500).json(apiError("server_error", "internal_error", "The server had an error processing your request."));
};
