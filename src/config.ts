import { z } from "zod";
import { DEFAULT_MAX_SPLITS } from "./state/splitTree.js";

const configSchema = z.object({
  SPLITWATCH_LOG_FILE: z.string().trim().min(1).default("done.org"),
  SPLITWATCH_MAX_SPLITS: z.coerce.number().int().min(1).max(1000).default(DEFAULT_MAX_SPLITS),
  SPLITWATCH_REFRESH_MS: z.coerce.number().int().min(10).max(1000).default(30),
  PORT: z.coerce.number().int().min(1).max(65535).default(2091)
});

export interface SplitwatchConfig {
  logFile: string;
  maxSplits: number;
  refreshMs: number;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SplitwatchConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    logFile: parsed.data.SPLITWATCH_LOG_FILE,
    maxSplits: parsed.data.SPLITWATCH_MAX_SPLITS,
    refreshMs: parsed.data.SPLITWATCH_REFRESH_MS,
    port: parsed.data.PORT
  };
}
