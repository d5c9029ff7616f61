import path from "path";
import { DEFAULT_OUTPUT_SUFFIX, DEFAULT_TIMEOUT_MS, GEMINI_MODEL } from "@/lib/constants";
import { ConfigurationError, errorMessage } from "@/lib/errors";
import type { ConfigStatus } from "@/types/selection";

export interface AppConfig {
  apiKey: string;
  model: string;
  requestTimeoutMs: number;
  outputSuffix: string;
  dataDir: string;
  promptsFile: string;
  logsDir: string;
}

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/** Data locations do not depend on the API key, so prompts and logs stay reachable without one. */
export function resolveDataPaths(
  env: Env = process.env,
  cwd: string = process.cwd()
): Pick<AppConfig, "dataDir" | "promptsFile" | "logsDir"> {
  const dataDir = path.resolve(cwd, env.DATA_DIR?.trim() || "data");
  return {
    dataDir,
    promptsFile: path.resolve(cwd, env.PROMPTS_FILE?.trim() || path.join(dataDir, "prompts.json")),
    logsDir: path.join(dataDir, "logs"),
  };
}

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const apiKey = (env.GOOGLE_API_KEY || env.GEMINI_API_KEY || "").trim();
  if (!apiKey) {
    throw new ConfigurationError(
      "GOOGLE_API_KEY environment variable not configured. Add it to .env.local and restart."
    );
  }

  const suffix = env.OUTPUT_SUFFIX?.trim() || DEFAULT_OUTPUT_SUFFIX;
  if (/[<>:"/\\|?*]/.test(suffix)) {
    throw new ConfigurationError(`OUTPUT_SUFFIX contains characters not allowed in file names: "${suffix}"`);
  }

  return {
    apiKey,
    model: env.GEMINI_MODEL?.trim() || GEMINI_MODEL,
    requestTimeoutMs: readPositiveInt(env, "GEMINI_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
    outputSuffix: suffix,
    ...resolveDataPaths(env, cwd),
  };
}

// --- Process-wide config, resolved once ---

let resolved: { config: AppConfig } | { error: ConfigurationError } | null = null;

function resolve() {
  if (!resolved) {
    try {
      resolved = { config: loadConfig() };
    } catch (error) {
      resolved = {
        error: error instanceof ConfigurationError ? error : new ConfigurationError(errorMessage(error)),
      };
    }
  }
  return resolved;
}

/** Throws the startup ConfigurationError on every call until the process restarts. */
export function getConfig(): AppConfig {
  const result = resolve();
  if ("error" in result) throw result.error;
  return result.config;
}

export function getConfigStatus(): ConfigStatus {
  const result = resolve();
  if ("error" in result) return { configured: false, error: result.error.message };
  return { configured: true, model: result.config.model };
}

/** Test hook: forget the resolved config so the next call re-reads the environment. */
export function resetConfig(): void {
  resolved = null;
}
