import { config as loadEnv } from "dotenv";

import type { DecodeErrorPolicy } from "./store/row_decode_error";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export type AppConfig = {
  port: number;
  host: string;
  dbPath: string;
  apiKey?: string;
  decodeErrorPolicy: DecodeErrorPolicy;
  nodeEnv: string;
};

const DEFAULT_DB_PATH = "./data/tabsync.db";

const resolveDecodeErrorPolicy = (value?: string): DecodeErrorPolicy => {
  if (!value) return "skip";
  if (value === "skip" || value === "abort") return value;
  throw new Error(`TABSYNC_DECODE_ERROR_POLICY must be "skip" or "abort", got "${value}"`);
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV ?? "development";
  const isDev = nodeEnv !== "production";

  const explicitDbPath = env.TABSYNC_DB_PATH ?? env.DB_PATH;
  if (!isDev && !explicitDbPath) {
    throw new Error("TABSYNC_DB_PATH must be set in non-dev environments.");
  }

  const apiKey = env.TABSYNC_API_KEY?.trim();

  return {
    port: Number(env.PORT ?? 3333) || 3333,
    host: env.HOST ?? "0.0.0.0",
    dbPath: explicitDbPath ?? DEFAULT_DB_PATH,
    apiKey: apiKey ? apiKey : undefined,
    decodeErrorPolicy: resolveDecodeErrorPolicy(env.TABSYNC_DECODE_ERROR_POLICY),
    nodeEnv,
  };
}
