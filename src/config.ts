// src/config.ts
import { MODEL_SUFFIX } from "./responseDocument.js";

export type ServerConfig = {
  port: number;
  bodyLimit: string;
  defaultModel: string;
  modelSuffix: string;
  appOrigin: string;
};

function envString(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

function envPort(env: NodeJS.ProcessEnv, fallback: number): number {
  const port = Number(env.PORT);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv): ServerConfig {
  return {
    port: envPort(env, 8080),
    bodyLimit: envString(env, "BODY_LIMIT", "2mb"),
    defaultModel: envString(env, "DEFAULT_MODEL", "gpt-4.1"),
    // suffix may legitimately be set to "" to echo the model untouched
    modelSuffix: env.MODEL_SUFFIX ?? MODEL_SUFFIX,
    appOrigin: envString(env, "APP_ORIGIN", "*"),
  };
}

export function logCfg(cfg: ServerConfig) {
  console.log("[cfg]", cfg);
}
