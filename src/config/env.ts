import { z } from "zod";
import { EmbeddingProvider, GenerationProvider } from "../infra/ai/types.js";
import { LogLevel } from "../utils/logger.js";

const booleanFlag = z.enum(["true", "false"]);

const envSchema = z.object({
  EMBEDDING_PROVIDER: z.enum(["hashing", "ollama", "openai"]).default("hashing"),
  GENERATION_PROVIDER: z.enum(["template", "ollama", "openai"]).default("template"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  GENERATION_MAX_TOKENS: z.coerce.number().int().positive().default(100),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(384),
  PERSIST_INDEX: booleanFlag.default("true"),
  INDEX_PATH: z.string().default(".data/vector-index.json"),
  CACHE_PATH: z.string().default(".data/online-cache.json"),
  DOCUMENTS_DIR: z.string().optional(),
  CHUNK_SIZE: z.coerce.number().int().positive().default(512),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),
  SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.3),
  TOP_K: z.coerce.number().int().positive().default(5),
  DEBOUNCE_MS: z.coerce.number().int().nonnegative().default(500),
  MIN_TRIGGER_CHARS: z.coerce.number().int().nonnegative().default(3),
  CONTEXT_WINDOW_CHARS: z.coerce.number().int().positive().default(100),
  MAX_CONTEXT_CHARS: z.coerce.number().int().positive().default(1500),
  SUGGESTION_VARIANTS: z.coerce.number().int().positive().max(10).default(3),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(1),
  CACHE_TTL_MS: z.coerce.number().int().positive().default(24 * 60 * 60 * 1000),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(256),
  ONLINE_SEARCH_ENABLED: booleanFlag.default("true"),
  ONLINE_SEARCH_URL: z.string().url().default("https://en.wikipedia.org/w/api.php"),
  ONLINE_TIMEOUT_MS: z.coerce.number().int().positive().default(4000),
  MAX_ONLINE_RESULTS: z.coerce.number().int().positive().default(3),
  RETAIN_WEAK_LOCAL_RESULTS: booleanFlag.default("false"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
  MCP_MAX_BODY_BYTES: z.coerce.number().int().positive().default(1_048_576),
});

export interface AppConfig {
  embeddingProvider: EmbeddingProvider;
  generationProvider: GenerationProvider;
  openaiApiKey: string | null;
  openaiEmbeddingModel: string;
  openaiChatModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  generationMaxTokens: number;
  generationTimeoutMs: number;
  vectorDimension: number;
  indexPath: string | null;
  cachePath: string;
  documentsDir: string | null;
  chunkSize: number;
  chunkOverlap: number;
  similarityThreshold: number;
  topK: number;
  debounceMs: number;
  minTriggerChars: number;
  contextWindowChars: number;
  maxContextChars: number;
  suggestionVariants: number;
  workerConcurrency: number;
  cacheTtlMs: number;
  cacheMaxEntries: number;
  onlineSearchEnabled: boolean;
  onlineSearchUrl: string;
  onlineTimeoutMs: number;
  maxOnlineResults: number;
  retainWeakLocalResults: boolean;
  logLevel: LogLevel;
  transport: "stdio" | "http";
  host: string;
  port: number;
  maxBodyBytes: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(stripEmptyValues(env));
  const openaiApiKey = parsed.OPENAI_API_KEY ?? null;

  if (
    (parsed.EMBEDDING_PROVIDER === "openai" || parsed.GENERATION_PROVIDER === "openai") &&
    !openaiApiKey
  ) {
    throw new Error("OpenAI providers require OPENAI_API_KEY.");
  }
  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new Error(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }

  return {
    embeddingProvider: parsed.EMBEDDING_PROVIDER,
    generationProvider: parsed.GENERATION_PROVIDER,
    openaiApiKey,
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    generationMaxTokens: parsed.GENERATION_MAX_TOKENS,
    generationTimeoutMs: parsed.GENERATION_TIMEOUT_MS,
    vectorDimension: parsed.VECTOR_DIMENSION,
    indexPath: parsed.PERSIST_INDEX === "true" ? parsed.INDEX_PATH : null,
    cachePath: parsed.CACHE_PATH,
    documentsDir: parsed.DOCUMENTS_DIR ?? null,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    similarityThreshold: parsed.SIMILARITY_THRESHOLD,
    topK: parsed.TOP_K,
    debounceMs: parsed.DEBOUNCE_MS,
    minTriggerChars: parsed.MIN_TRIGGER_CHARS,
    contextWindowChars: parsed.CONTEXT_WINDOW_CHARS,
    maxContextChars: parsed.MAX_CONTEXT_CHARS,
    suggestionVariants: parsed.SUGGESTION_VARIANTS,
    workerConcurrency: parsed.WORKER_CONCURRENCY,
    cacheTtlMs: parsed.CACHE_TTL_MS,
    cacheMaxEntries: parsed.CACHE_MAX_ENTRIES,
    onlineSearchEnabled: parsed.ONLINE_SEARCH_ENABLED === "true",
    onlineSearchUrl: parsed.ONLINE_SEARCH_URL,
    onlineTimeoutMs: parsed.ONLINE_TIMEOUT_MS,
    maxOnlineResults: parsed.MAX_ONLINE_RESULTS,
    retainWeakLocalResults: parsed.RETAIN_WEAK_LOCAL_RESULTS === "true",
    logLevel: parsed.LOG_LEVEL,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
    maxBodyBytes: parsed.MCP_MAX_BODY_BYTES,
  };
}

// `FOO=` in a .env file should fall back to the default rather than fail parsing.
function stripEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }
  return cleaned;
}
