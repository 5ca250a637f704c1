// src/responseDocument.ts
import { randomUUID } from "crypto";
import { makeThreeSentenceStory, words } from "./story.js";

export type OutputText = { type: "output_text"; text: string; annotations: never[] };

export type OutputMessage = {
  type: "message";
  id: string;
  status: "completed";
  role: "assistant";
  content: OutputText[];
};

export type Usage = {
  input_tokens: number;
  input_tokens_details: { cached_tokens: number };
  output_tokens: number;
  output_tokens_details: { reasoning_tokens: number };
  total_tokens: number;
};

// Mirrors the real /v1/responses payload; fields we never populate stay null/empty.
export type ResponseDocument = {
  id: string;
  object: "response";
  created_at: number;
  status: "completed";
  error: null;
  incomplete_details: null;
  instructions: null;
  max_output_tokens: null;
  model: string;
  output: OutputMessage[];
  parallel_tool_calls: false;
  previous_response_id: null;
  reasoning: { effort: null; summary: null };
  store: true;
  temperature: number;
  text: { format: { type: "text" } };
  tool_choice: "auto";
  tools: never[];
  top_p: number;
  truncation: "disabled";
  usage: Usage;
  user: null;
  metadata: Record<string, never>;
};

export type SynthesisInput = {
  model: string;
  inputText: string;
  temperature?: number;
  topP?: number;
  modelSuffix?: string;
};

export type SynthesisDeps = {
  newId: () => string;
  now: () => number;
};

export const MODEL_SUFFIX = "-2025-04-14";
export const DEFAULT_SAMPLING = 1.0;

function hexId(): string {
  return randomUUID().replace(/-/g, "");
}

const defaultDeps: SynthesisDeps = { newId: hexId, now: () => Date.now() };

function stringifyPart(x: unknown): string {
  if (typeof x === "string") return x;
  if (x === undefined) return "";
  if (x === null || typeof x !== "object") return String(x);
  return JSON.stringify(x);
}

/** Collapse the request's `input` (string, list, or absent) into one prompt string. */
export function normalizeInput(input: unknown): string {
  if (Array.isArray(input)) return input.map(stringifyPart).join(" ");
  if (!input) return "";
  return stringifyPart(input);
}

export function buildResponseDocument(
  req: SynthesisInput,
  deps: SynthesisDeps = defaultDeps
): ResponseDocument {
  const text = makeThreeSentenceStory(req.inputText);
  const inputTokens = words(req.inputText).length;
  const outputTokens = words(text).length;

  return {
    id: `resp_${deps.newId()}`,
    object: "response",
    created_at: Math.floor(deps.now() / 1000),
    status: "completed",
    error: null,
    incomplete_details: null,
    instructions: null,
    max_output_tokens: null,
    model: `${req.model}${req.modelSuffix ?? MODEL_SUFFIX}`,
    output: [
      {
        type: "message",
        id: `msg_${deps.newId()}`,
        status: "completed",
        role: "assistant",
        content: [{ type: "output_text", text, annotations: [] }],
      },
    ],
    parallel_tool_calls: false,
    previous_response_id: null,
    reasoning: { effort: null, summary: null },
    store: true,
    temperature: req.temperature ?? DEFAULT_SAMPLING,
    text: { format: { type: "text" } },
    tool_choice: "auto",
    tools: [],
    top_p: req.topP ?? DEFAULT_SAMPLING,
    truncation: "disabled",
    usage: {
      input_tokens: inputTokens,
      input_tokens_details: { cached_tokens: 0 },
      output_tokens: outputTokens,
      output_tokens_details: { reasoning_tokens: 0 },
      total_tokens: inputTokens + outputTokens,
    },
    user: null,
    metadata: {},
  };
}
