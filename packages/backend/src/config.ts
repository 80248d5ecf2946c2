import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8080),
  CORS_ORIGIN: z.string().default("http://localhost:3000"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(300),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  NEO4J_URI: z.string().default("bolt://localhost:7687"),
  NEO4J_USER: z.string().default("neo4j"),
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: z.string().default("neo4j"),
  NEO4J_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  GDS_PROJECTION_NAME: z
    .string()
    .regex(/^[A-Za-z][A-Za-z0-9_]*$/)
    .default("supply_chain_graph"),
  ANALYSIS_MAX_CONCURRENT: z.coerce.number().int().positive().default(4),
  ANALYSIS_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  ANALYSIS_MAX_RETRIES: z.coerce.number().int().min(0).default(1),
  ANALYSIS_RETRY_DELAY_MS: z.coerce.number().int().positive().default(500),
  MAX_PATH_HOPS: z.coerce.number().int().min(1).max(15).default(10),
  ALLOW_GRAPH_RESET: booleanFlag
});

export type AppConfig = z.infer<typeof envSchema>;
export const appConfig: AppConfig = envSchema.parse(process.env);
