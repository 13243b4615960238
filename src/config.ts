// src/config.ts
import dotenv from "dotenv";

export interface Config {
  port: number;
  dataDir: string;
  corsOrigin: string[];
  openaiApiKey?: string;
  openaiModel: string;
  openaiBaseUrl?: string;
  modelTimeoutMs: number;
  nodeEnv: "development" | "production" | "test";
}

const NODE_ENVS: ReadonlyArray<Config["nodeEnv"]> = ["development", "production", "test"];

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function optional(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv): Config {
  const nodeEnv = NODE_ENVS.find((e) => e === env.NODE_ENV) ?? "development";

  return {
    port: positiveInt("PORT", env.PORT, 8000),
    dataDir: optional(env.DATA_DIR) ?? "data",
    corsOrigin: (env.CORS_ORIGIN || "*")
      .split(",")
      .map((o) => o.trim())
      .filter(Boolean),
    // no key is not fatal: generation endpoints answer 503 instead
    openaiApiKey: optional(env.OPENAI_API_KEY),
    openaiModel: optional(env.OPENAI_MODEL) ?? "gpt-4o-mini",
    openaiBaseUrl: optional(env.OPENAI_BASE_URL),
    modelTimeoutMs: positiveInt("MODEL_TIMEOUT_MS", env.MODEL_TIMEOUT_MS, 60_000),
    nodeEnv,
  };
}

export function readConfig(): Config {
  dotenv.config();
  return loadConfig(process.env);
}
