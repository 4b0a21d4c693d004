import path from "node:path";
import { readFile } from "node:fs/promises";
import type { LedgerConfig } from "./types.js";
import { log } from "./logger.js";

const DEFAULT_DATA_DIR = path.resolve("data");

function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = process.env[envVar];
    if (!envValue) {
      throw new Error(`Environment variable ${envVar} is not set`);
    }
    return envValue;
  });
}

/**
 * `${VAR}` expansion for one config key. An unset variable leaves the key
 * unset so only the features that need it fail later.
 */
function expand(value: string, key: string): string | undefined {
  try {
    return resolveEnvVars(value);
  } catch (err) {
    log.warn(`ignoring ${key}:`, err);
    return undefined;
  }
}

function normalizeOpenaiBaseUrl(
  value: string | undefined,
  source: "config" | "env",
  key = "openaiBaseUrl",
): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    log.warn(`ignoring invalid ${key} from ${source}: not a valid URL`);
    return undefined;
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    log.warn(
      `ignoring ${key} from ${source}: unsupported URL scheme (${parsed.protocol.replace(":", "")})`,
    );
    return undefined;
  }

  if (parsed.protocol === "http:") {
    log.warn(`${key} from ${source} is using insecure http; prefer https`);
  }

  return parsed.toString().replace(/\/+$/, "");
}

function str(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim().length > 0 ? value : fallback;
}

function positiveInt(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : fallback;
}

function temperature(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0 && value <= 2
    ? value
    : fallback;
}

export function parseConfig(raw: unknown): LedgerConfig {
  const cfg: Record<string, unknown> =
    raw && typeof raw === "object" && !Array.isArray(raw)
      ? Object.fromEntries(Object.entries(raw))
      : {};

  // The key is optional: retrieval and world-state browsing work without it.
  const openaiApiKey =
    typeof cfg.openaiApiKey === "string" && cfg.openaiApiKey.length > 0
      ? expand(cfg.openaiApiKey, "openaiApiKey")
      : process.env.OPENAI_API_KEY || undefined;

  const openaiBaseUrl =
    typeof cfg.openaiBaseUrl === "string" && cfg.openaiBaseUrl.trim().length > 0
      ? normalizeOpenaiBaseUrl(expand(cfg.openaiBaseUrl, "openaiBaseUrl"), "config")
      : normalizeOpenaiBaseUrl(process.env.OPENAI_BASE_URL, "env");

  // A separate OpenAI-compatible endpoint (e.g. a local server) for embeddings.
  const embeddingBaseUrl =
    typeof cfg.embeddingBaseUrl === "string" && cfg.embeddingBaseUrl.trim().length > 0
      ? normalizeOpenaiBaseUrl(expand(cfg.embeddingBaseUrl, "embeddingBaseUrl"), "config", "embeddingBaseUrl")
      : undefined;
  const embeddingApiKey =
    typeof cfg.embeddingApiKey === "string" && cfg.embeddingApiKey.length > 0
      ? expand(cfg.embeddingApiKey, "embeddingApiKey")
      : undefined;

  const dataDir = str(cfg.dataDir, DEFAULT_DATA_DIR);
  const extractionModel = str(cfg.extractionModel, "gpt-4.1-nano");

  return {
    openaiApiKey,
    openaiBaseUrl,
    embeddingBaseUrl,
    embeddingApiKey,
    dataDir,
    worldStatePath: str(cfg.worldStatePath, path.join(dataDir, "world_state.json")),
    sessionSummaryDir: str(cfg.sessionSummaryDir, path.join(dataDir, "session_summaries")),
    rulebookDir: str(cfg.rulebookDir, path.join(dataDir, "rulebooks")),
    vectorDbPath: str(cfg.vectorDbPath, path.join(dataDir, "vector_store", "index.sqlite")),
    embeddingModel: str(cfg.embeddingModel, "text-embedding-3-small"),
    answerModel: str(cfg.answerModel, "gpt-4o-mini"),
    extractionModel,
    summaryModel: str(cfg.summaryModel, extractionModel),
    embedBatchSize: positiveInt(cfg.embedBatchSize, 128),
    searchTopK: positiveInt(cfg.searchTopK, 5),
    answerTemperature: temperature(cfg.answerTemperature, 0.4),
    extractionTemperature: temperature(cfg.extractionTemperature, 0.2),
    summaryTemperature: temperature(cfg.summaryTemperature, 0.3),
    transcriptChunkTokens: positiveInt(cfg.transcriptChunkTokens, 3000),
    extractionConcurrency: positiveInt(cfg.extractionConcurrency, 1),
    debug: cfg.debug === true,
  };
}

/**
 * Read a JSON config file and parse it. A missing or broken file is not
 * fatal; the defaults (plus environment) apply.
 */
export async function loadConfigFile(filePath: string | undefined): Promise<LedgerConfig> {
  if (!filePath) return parseConfig({});
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, "utf-8"));
  } catch (err) {
    log.warn(`failed to load config from ${filePath}:`, err);
    return parseConfig({});
  }
  return parseConfig(raw);
}
