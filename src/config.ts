// Centralized configuration & environment variable access.
// Loads .env at startup using dotenv; everything downstream receives the
// frozen AppConfig built here instead of reading process.env.
import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { ConfigError } from "./common/errors";

// Load .env if present. Warn if only .env.example exists.
const envPath = path.resolve(process.cwd(), ".env");
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
} else if (process.env.NODE_ENV !== "test") {
  const examplePath = path.resolve(process.cwd(), ".env.example");
  if (fs.existsSync(examplePath)) {
    console.warn(
      "[config] .env file not found. You edited .env.example but must copy it to .env for values to load."
    );
  } else {
    console.warn(
      "[config] No .env file present. Environment variables must be set externally."
    );
  }
}

export type DeliveryMode = "single" | "batch";

export interface AppConfig {
  readonly environment: "development" | "production" | "test";
  readonly openAiKey?: string;
  readonly newsApiKey?: string;
  readonly naverClientId?: string;
  readonly naverClientSecret?: string;
  readonly allowInsecureTls: boolean;

  readonly llmModel: string;
  readonly llmTemperature: number;
  readonly summaryTemperature: number;
  readonly llmRequestsPerMinute: number;

  readonly embeddingModel: string;
  readonly embeddingDimensions: number;
  readonly embeddingBatchSize: number;

  readonly firstDedupThreshold: number;
  readonly secondDedupThreshold: number;

  readonly searchKeywords: readonly string[];
  readonly newsLanguage: string;
  readonly referenceUtcOffsetMinutes: number;
  readonly pageSize: number;
  readonly naverMaxPages: number;
  readonly newsApiMaxPages: number;
  readonly minYesterdayTarget: number;
  readonly olderStopThreshold: number;
  readonly leadSentences: number;

  readonly minExtractedLength: number;
  readonly extractionDelayMs: number;

  readonly organizationProfile: string;

  readonly azureStorageConnectionString?: string;
  readonly checkpointContainer: string;
  readonly localCheckpointDir: string;
  readonly outputDir: string;

  readonly deliveryApiBase: string;
  readonly deliveryBotToken?: string;
  readonly deliveryRoomId?: string;
  readonly deliveryMode: DeliveryMode;

  readonly port: number;
}

const DEFAULT_KEYWORDS = [
  "OpenAI",
  "Google AI",
  "Claude",
  "generative AI",
  "AI advertising",
  "AI marketing",
  "AI service",
  "AI solution",
  "AI regulation",
];

type Env = Record<string, string | undefined>;

export function getConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    environment: readEnvironment(env.NODE_ENV),
    openAiKey: nonEmpty(env.OPENAI_API_KEY),
    newsApiKey: nonEmpty(env.NEWS_API_KEY),
    naverClientId: nonEmpty(env.NAVER_CLIENT_ID),
    naverClientSecret: nonEmpty(env.NAVER_CLIENT_SECRET),
    allowInsecureTls: env.ALLOW_INSECURE_TLS === "true",

    llmModel: env.LLM_MODEL || "gpt-4o-mini",
    llmTemperature: readNumber(env, "LLM_TEMPERATURE", 0.1),
    summaryTemperature: readNumber(env, "SUMMARY_TEMPERATURE", 0.2),
    llmRequestsPerMinute: readNumber(env, "LLM_REQUESTS_PER_MINUTE", 60),

    embeddingModel: env.EMBEDDING_MODEL || "text-embedding-3-small",
    embeddingDimensions: readNumber(env, "EMBEDDING_DIMENSIONS", 768),
    embeddingBatchSize: readNumber(env, "EMBEDDING_BATCH_SIZE", 50),

    firstDedupThreshold: readNumber(env, "FIRST_DEDUP_THRESHOLD", 0.85),
    secondDedupThreshold: readNumber(env, "SECOND_DEDUP_THRESHOLD", 0.9),

    searchKeywords: readList(env.SEARCH_KEYWORDS, DEFAULT_KEYWORDS),
    newsLanguage: env.NEWS_LANGUAGE || "en",
    referenceUtcOffsetMinutes: readNumber(env, "REFERENCE_UTC_OFFSET_MINUTES", 540),
    pageSize: readNumber(env, "PAGE_SIZE", 100),
    naverMaxPages: readNumber(env, "NAVER_MAX_PAGES", 10),
    newsApiMaxPages: readNumber(env, "NEWS_API_MAX_PAGES", 1),
    minYesterdayTarget: readNumber(env, "MIN_YESTERDAY_TARGET", 30),
    olderStopThreshold: readNumber(env, "OLDER_STOP_THRESHOLD", 50),
    leadSentences: readNumber(env, "LEAD_SENTENCES", 3),

    minExtractedLength: readNumber(env, "MIN_EXTRACTED_LENGTH", 200),
    extractionDelayMs: readNumber(env, "EXTRACTION_DELAY_MS", 500),

    organizationProfile:
      env.ORGANIZATION_PROFILE ||
      "a retail membership and advertising data business (member data platform, advertising agency services, data sales, online-offline retail linkage)",

    azureStorageConnectionString: nonEmpty(env.AZURE_STORAGE_CONNECTION_STRING),
    checkpointContainer: env.CHECKPOINT_CONTAINER || "news-sieve-checkpoints",
    localCheckpointDir: env.LOCAL_CHECKPOINT_DIR || "daily_results",
    outputDir: env.OUTPUT_DIR || "output",

    deliveryApiBase: env.DELIVERY_API_BASE || "https://webexapis.com/v1",
    deliveryBotToken: nonEmpty(env.DELIVERY_BOT_TOKEN),
    deliveryRoomId: nonEmpty(env.DELIVERY_ROOM_ID),
    deliveryMode: env.DELIVERY_MODE === "batch" ? "batch" : "single",

    port: readNumber(env, "PORT", 3000),
  };
  return Object.freeze(config);
}

export function requireConfigKeys(cfg: AppConfig, keys: (keyof AppConfig)[]) {
  const missing = keys.filter((k) => !cfg[k]);
  if (missing.length) {
    throw new ConfigError(`Missing required config keys: ${missing.join(", ")}`);
  }
  return cfg;
}

function readEnvironment(value: string | undefined): AppConfig["environment"] {
  if (value === "production" || value === "test") return value;
  return "development";
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  return parsed;
}

function readList(raw: string | undefined, fallback: string[]): readonly string[] {
  if (!raw) return Object.freeze([...fallback]);
  const items = raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return Object.freeze(items.length ? items : [...fallback]);
}
