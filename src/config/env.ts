import { config as loadEnvironment } from "dotenv";
import { z } from "zod";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import type { LogLevel } from "../core/logger.js";

/**
 * Runtime configuration for the dashboard.
 */
export interface Config {
  nvidia_smi: string;
  log_level: LogLevel;
  interval_ms: number;
  history_size: number;
  timeout_ms: number;
  processes: boolean;
}

/**
 * Flags as handed over by the argument parser, still unvalidated.
 */
export type RawOptions = {
  interval?: string | number;
  history?: string | number;
  timeout?: string | number;
  processes?: boolean;
};

export const DEFAULT_INTERVAL_MS = 500;
export const DEFAULT_HISTORY_SIZE = 60;
export const DEFAULT_TIMEOUT_MS = 2000;

const environmentSchema = z.object({
  GPUWATCH_NVIDIA_SMI: z.string().min(1).default("nvidia-smi"),
  GPUWATCH_LOG_LEVEL: z
    .string()
    .toLowerCase()
    .pipe(z.enum(["debug", "info", "warn", "error"]))
    .default("warn"),
});

const optionsSchema = z.object({
  interval: z.coerce.number().int().min(100).max(60_000).default(DEFAULT_INTERVAL_MS),
  history: z.coerce.number().int().min(2).max(600).default(DEFAULT_HISTORY_SIZE),
  timeout: z.coerce.number().int().min(100).max(30_000).default(DEFAULT_TIMEOUT_MS),
  processes: z.boolean().default(true),
});

/**
 * Load the closest .env file from current or parent directory.
 * @returns The loaded .env path or undefined.
 */
export const loadDotEnvironment = (): string | undefined => {
  const candidates = [resolve(process.cwd(), ".env"), resolve(process.cwd(), "..", ".env")];

  const envPath = candidates.find((pathValue) => existsSync(pathValue));
  if (envPath) {
    loadEnvironment({ path: envPath });
  }
  return envPath;
};

/**
 * Create a validated runtime configuration from flags and environment variables.
 * @param options - Parsed command line flags.
 * @param environment - Environment to read, process.env by default.
 * @returns Validated configuration object.
 */
export const createConfig = (
  options: RawOptions = {},
  environment: NodeJS.ProcessEnv = process.env,
): Config => {
  const env = environmentSchema.parse(environment);
  const flags = optionsSchema.parse(options);

  return {
    nvidia_smi: env.GPUWATCH_NVIDIA_SMI,
    log_level: env.GPUWATCH_LOG_LEVEL,
    interval_ms: flags.interval,
    history_size: flags.history,
    timeout_ms: flags.timeout,
    processes: flags.processes,
  };
};
