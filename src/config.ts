import { readFileSync, existsSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { logger } from "./logger";
import type { NewsworthyPolicy } from "./newsworthy";
import type { Partition } from "./types";

const sourceEndpointSchema = z.object({
  clientName: z.string().min(1),
  clientVersion: z.string().min(1),
  timeoutMs: z.number().int().positive(),
});

const sourcesConfigSchema = z.object({
  description: z.string(),
  graphqlUrl: z.string().url(),
  listingBaseUrl: z.string().url(),
  userAgent: z.string().min(1),
  maxPageSize: z.number().int().positive(),
  politenessDelayMs: z.number().int().nonnegative(),
  search: sourceEndpointSchema,
  details: sourceEndpointSchema,
  agentProfiles: z.object({
    timeoutMs: z.number().int().positive(),
  }),
});

const partitionsConfigSchema = z.object({
  description: z.string(),
  stateCode: z.string().length(2),
  partitions: z
    .array(
      z.object({
        label: z.string().min(1),
        location: z.string().min(1).optional(),
      }),
    )
    .min(1),
});

export type SourceEndpoint = z.infer<typeof sourceEndpointSchema>;
export type SourcesConfig = z.infer<typeof sourcesConfigSchema>;
export type PartitionsConfig = z.infer<typeof partitionsConfigSchema>;

export interface QueryDocuments {
  search: string;
  details: string;
}

export interface EnvConfig {
  telegramBotToken: string;
  telegramChatIds: string[];
  dryRun: boolean;
  timezone: string;
  nodeEnv: string;
  port: number;
  databasePath: string;
  daysOld: number | null;
  pageLimit: number;
  maxConcurrentDetails: number;
  runTimeoutMs: number;
  agentProfileLookups: boolean;
  newsworthy: NewsworthyPolicy;
  ingestSchedule: string;
}

export interface AppConfig {
  env: EnvConfig;
  sources: SourcesConfig;
  partitions: Partition[];
  queries: QueryDocuments;
}

export interface LoadConfigOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
}

const ROOT_DIR = join(dirname(fileURLToPath(import.meta.url)), "..");
const CONFIG_DIR = join(ROOT_DIR, "config");

export function parseEnvInt(
  value: string | undefined,
  fallback: number,
  min?: number,
  max?: number,
): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (Number.isNaN(parsed)) return fallback;

  if (typeof min === "number" && parsed < min) return min;
  if (typeof max === "number" && parsed > max) return max;
  return parsed;
}

function stripJsonComments(raw: string): string {
  // Strip comments while preserving string contents (avoid corrupting URLs).
  return raw.replace(
    /\\"|"(?:\\"|[^"])*"|(\/\/.*|\/\*[\s\S]*?\*\/)/g,
    (match, comment) => (comment ? "" : match),
  );
}

function loadJsonConfig<T extends z.ZodTypeAny>(
  configDir: string,
  filename: string,
  schema: T,
): z.infer<T> {
  const filepath = join(configDir, filename);

  if (!existsSync(filepath)) {
    throw new Error(`Config file not found: ${filepath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonComments(readFileSync(filepath, "utf-8")));
  } catch (error) {
    throw new Error(`Failed to parse config file ${filename}: ${error}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `Invalid config file ${filename}: ${result.error.issues
        .map((i) => `${i.path.join(".")} ${i.message}`)
        .join("; ")}`,
    );
  }
  return result.data;
}

function loadQueryDocument(configDir: string, filename: string): string {
  const filepath = join(configDir, "graphql", filename);
  if (!existsSync(filepath)) {
    throw new Error(`GraphQL document not found: ${filepath}`);
  }
  return readFileSync(filepath, "utf-8").trim();
}

export function parseNewsworthyPolicy(env: NodeJS.ProcessEnv): NewsworthyPolicy {
  const kind = (env.NEWSWORTHY_POLICY ?? "all").trim().toLowerCase();

  switch (kind) {
    case "all":
      return { kind: "all" };
    case "daily-window":
      return {
        kind: "daily-window",
        cutoffHourUtc: parseEnvInt(env.DAILY_CUTOFF_HOUR_UTC, 2, 0, 23),
      };
    case "rolling":
      return {
        kind: "rolling",
        hours: parseEnvInt(env.NEWSWORTHY_WINDOW_HOURS, 24, 1, 24 * 30),
      };
    default:
      throw new Error(
        `Unknown NEWSWORTHY_POLICY "${kind}" (expected all, rolling or daily-window)`,
      );
  }
}

function parseChatIds(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const daysOld = parseEnvInt(env.DAYS_OLD, 1, 0, 365);

  return {
    telegramBotToken: env.TELEGRAM_BOT_TOKEN ?? "",
    telegramChatIds: parseChatIds(env.TELEGRAM_CHAT_IDS),
    dryRun: env.DRY_RUN === "true",
    timezone: env.TZ ?? "America/Chicago",
    nodeEnv: env.NODE_ENV ?? "development",
    port: parseEnvInt(env.PORT, 3000, 1, 65535),
    databasePath: env.DATABASE_PATH || join(ROOT_DIR, "data", "listings.db"),
    // 0 disables the list-date floor entirely.
    daysOld: daysOld === 0 ? null : daysOld,
    pageLimit: parseEnvInt(env.PAGE_LIMIT, 200, 1),
    maxConcurrentDetails: parseEnvInt(env.MAX_CONCURRENT_DETAILS, 10, 1, 50),
    runTimeoutMs: parseEnvInt(env.RUN_TIMEOUT_MS, 0, 0),
    agentProfileLookups: env.AGENT_PROFILE_LOOKUPS === "true",
    newsworthy: parseNewsworthyPolicy(env),
    ingestSchedule: env.INGEST_SCHEDULE ?? "0 8 * * *",
  };
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  logger.info("Loading configuration...");

  const configDir = options.configDir ?? CONFIG_DIR;
  const env = loadEnvConfig(options.env ?? process.env);
  const sources = loadJsonConfig(configDir, "sources.json", sourcesConfigSchema);
  const partitionsConfig = loadJsonConfig(
    configDir,
    "partitions.json",
    partitionsConfigSchema,
  );
  const queries: QueryDocuments = {
    search: loadQueryDocument(configDir, "home-search.graphql"),
    details: loadQueryDocument(configDir, "property-details.graphql"),
  };

  const partitions: Partition[] = partitionsConfig.partitions.map((p) => ({
    label: p.label,
    location: p.location ?? null,
    stateCode: partitionsConfig.stateCode,
  }));

  if (!env.telegramBotToken) {
    logger.warn("TELEGRAM_BOT_TOKEN not set — run reports will not be sent");
  } else if (env.telegramChatIds.length === 0) {
    logger.warn("TELEGRAM_CHAT_IDS not set — run reports will not be sent");
  }
  if (env.dryRun) {
    logger.info("🧪 DRY RUN MODE — no notifications will be sent");
  }
  if (env.pageLimit > sources.maxPageSize) {
    logger.warn(
      `PAGE_LIMIT ${env.pageLimit} exceeds the source maximum — requests are capped at ${sources.maxPageSize}`,
    );
  }

  logger.info(`Config loaded successfully:`);
  logger.info(
    `  - ${partitions.length} partitions: ${partitions.map((p) => p.label).join(", ")}`,
  );
  logger.info(
    `  - Lookback: ${env.daysOld === null ? "unbounded" : `${env.daysOld} day(s)`}`,
  );
  logger.info(`  - Detail concurrency: ${env.maxConcurrentDetails}`);
  logger.info(`  - Newsworthy policy: ${JSON.stringify(env.newsworthy)}`);
  logger.info(`  - Database: ${env.databasePath}`);
  logger.info(`  - Environment: ${env.nodeEnv}`);
  logger.info(`  - Timezone: ${env.timezone}`);

  return { env, sources, partitions, queries };
}
