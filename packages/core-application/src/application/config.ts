import { z } from "zod";
import { ConfigError } from "./errors";

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const intFromEnv = (min: number) => z.coerce.number().int().min(min);

export const SyncClientConfigSchema = z.object({
  serverUrl: z.string().url().default("http://localhost:8000"),
  projectId: z.string().min(1),
  rootDir: z.string().min(1),
  /** Quiet period after the last trigger before a cycle starts. */
  debounceMs: intFromEnv(0).default(2000),
  /** Periodic trigger; 0 disables it. */
  pollIntervalMs: intFromEnv(0).default(0),
  watch: z.boolean().default(true),
  requestTimeoutMs: intFromEnv(1).default(10_000),
  /** Upper bound on decoded content bytes per pushChanges call. */
  batchMaxBytes: intFromEnv(1).default(4 * 1024 * 1024),
  hashConcurrency: intFromEnv(1).default(8),
  logLevel: LogLevelSchema.default("info"),
});
export type SyncClientConfig = z.infer<typeof SyncClientConfigSchema>;

const EmbeddingProviderConfigSchema = z.object({
  kind: z.enum(["ollama", "openai-compatible"]).default("ollama"),
  baseUrl: z.string().url().default("http://localhost:11434"),
  model: z.string().min(1).default("nomic-embed-text"),
  apiKey: z.string().min(1).optional(),
  timeoutMs: intFromEnv(1).default(30_000),
});
export type EmbeddingProviderConfig = z.infer<typeof EmbeddingProviderConfigSchema>;

export const SyncServerConfigSchema = z.object({
  host: z.string().min(1).default("0.0.0.0"),
  port: intFromEnv(0).max(65535).default(8000),
  dataDir: z.string().min(1).default(".code-sync"),
  maxChunkChars: intFromEnv(1).default(1500),
  embedding: EmbeddingProviderConfigSchema.default({}),
  encryption: z.object({
    keyId: z.string().min(1).default("k1"),
    /** base64 of exactly 32 bytes */
    key: z
      .string()
      .min(1)
      .refine((k) => Buffer.from(k, "base64").length === 32, "encryption key must decode to 32 bytes"),
  }),
  logLevel: LogLevelSchema.default("info"),
});
export type SyncServerConfig = z.infer<typeof SyncServerConfigSchema>;

export type Env = Record<string, string | undefined>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid ${what} configuration: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

function flag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return !["0", "false", "no", "off"].includes(value.toLowerCase());
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function parseClientConfig(input: unknown): SyncClientConfig {
  return parseOrThrow(SyncClientConfigSchema, input, "client");
}

export function parseServerConfig(input: unknown): SyncServerConfig {
  return parseOrThrow(SyncServerConfigSchema, input, "server");
}

export function loadClientConfigFromEnv(env: Env = process.env): SyncClientConfig {
  const v = (name: string) => blankToUndefined(env[`CODE_SYNC_${name}`]);
  return parseClientConfig({
    serverUrl: v("SERVER_URL"),
    projectId: v("PROJECT_ID"),
    rootDir: v("ROOT_DIR"),
    debounceMs: v("DEBOUNCE_MS"),
    pollIntervalMs: v("POLL_INTERVAL_MS"),
    watch: flag(v("WATCH")),
    requestTimeoutMs: v("REQUEST_TIMEOUT_MS"),
    batchMaxBytes: v("BATCH_MAX_BYTES"),
    hashConcurrency: v("HASH_CONCURRENCY"),
    logLevel: v("LOG_LEVEL"),
  });
}

export function loadServerConfigFromEnv(env: Env = process.env): SyncServerConfig {
  const v = (name: string) => blankToUndefined(env[`CODE_SYNC_${name}`]);
  return parseServerConfig({
    host: v("HOST"),
    port: v("PORT"),
    dataDir: v("DATA_DIR"),
    maxChunkChars: v("MAX_CHUNK_CHARS"),
    embedding: {
      kind: v("EMBEDDING_PROVIDER"),
      baseUrl: v("EMBEDDING_URL"),
      model: v("EMBEDDING_MODEL"),
      apiKey: v("EMBEDDING_API_KEY"),
      timeoutMs: v("EMBEDDING_TIMEOUT_MS"),
    },
    encryption: {
      keyId: v("ENCRYPTION_KEY_ID"),
      key: v("ENCRYPTION_KEY"),
    },
    logLevel: v("LOG_LEVEL"),
  });
}
