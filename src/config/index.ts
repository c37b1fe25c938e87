/**
 * @fileoverview Loads, validates, and exports application configuration.
 * Values come from environment variables (optionally via a `.env` file) and
 * from `package.json`. A Zod schema validates every variable; invalid values
 * are reported and replaced by their defaults.
 *
 * @module src/config/index
 */

import dotenv from "dotenv";
import { existsSync, readFileSync } from "fs";
import path, { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

dotenv.config();

// --- Determine Project Root ---
const findProjectRoot = (startDir: string): string => {
  let currentDir = startDir;
  while (true) {
    const packageJsonPath = join(currentDir, "package.json");
    if (existsSync(packageJsonPath)) {
      return currentDir;
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      throw new Error(
        `Could not find project root (package.json) starting from ${startDir}`,
      );
    }
    currentDir = parentDir;
  }
};

let projectRoot: string;
try {
  const currentModuleDir = dirname(fileURLToPath(import.meta.url));
  projectRoot = findProjectRoot(currentModuleDir);
} catch (error: unknown) {
  const errorMessage = error instanceof Error ? error.message : String(error);
  projectRoot = process.cwd();
  if (process.stdout.isTTY) {
    console.warn(
      `Warning: ${errorMessage}. Using process.cwd() (${projectRoot}) as project root.`,
    );
  }
}
// --- End Determine Project Root ---

const PackageJsonSchema = z.object({
  name: z.string().default("pubmed-research-agent"),
  version: z.string().default("0.0.0"),
  description: z.string().default("No description provided."),
});

/**
 * Loads the name, version and description from the project's package.json.
 * @private
 */
const loadPackageJson = (): z.infer<typeof PackageJsonSchema> => {
  const fallback = PackageJsonSchema.parse({});
  const pkgPath = join(projectRoot, "package.json");
  if (!existsSync(pkgPath)) {
    return fallback;
  }

  try {
    const parsed = PackageJsonSchema.safeParse(
      JSON.parse(readFileSync(pkgPath, "utf-8")),
    );
    return parsed.success ? parsed.data : fallback;
  } catch (error) {
    if (process.stdout.isTTY) {
      console.error(
        "Warning: Could not read or parse package.json. Using hardcoded defaults.",
        error,
      );
    }
    return fallback;
  }
};

const pkg = loadPackageJson();

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),

  // Logging
  LOG_LEVEL: z
    .enum([
      "debug",
      "info",
      "notice",
      "warning",
      "error",
      "crit",
      "alert",
      "emerg",
    ])
    .default("info"),
  LOGS_DIR: z.string().default(path.join(projectRoot, "logs")),

  // Run mode: interactive console loop or MCP stdio server
  AGENT_MODE: z.enum(["console", "mcp"]).default("console"),
  AGENT_MAX_AUTHOR_RESULTS: z.coerce.number().int().positive().max(1000).default(20),
  AGENT_PAGE_SIZE: z.coerce.number().int().positive().max(20).default(3),
  AGENT_HISTORY_LIMIT: z.coerce.number().int().nonnegative().default(10),

  // Per-session result cache
  RESULT_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(100),
  RESULT_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(0),

  // Language model (any OpenAI-compatible chat-completions endpoint)
  LLM_API_KEY: z.string().optional(),
  GROQ_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().default("https://api.groq.com/openai/v1"),
  LLM_MODEL: z.string().optional(),
  GROQ_MODEL: z.string().optional(),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

  // NCBI E-utilities
  NCBI_API_KEY: z.string().optional(),
  NCBI_TOOL_IDENTIFIER: z.string().optional(),
  NCBI_ADMIN_EMAIL: z.string().email().optional(),
  NCBI_REQUEST_DELAY_MS: z.coerce.number().int().positive().optional(),
  NCBI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

// Empty strings in .env files mean "unset".
const rawEnv = Object.fromEntries(
  Object.entries(process.env).filter(([, value]) => value !== ""),
);

const parsedEnv = EnvSchema.safeParse(rawEnv);

if (!parsedEnv.success && process.stdout.isTTY) {
  console.error(
    "Invalid environment variables, falling back to defaults:",
    parsedEnv.error.flatten().fieldErrors,
  );
}

const env = parsedEnv.success ? parsedEnv.data : EnvSchema.parse({});

export const config = {
  pkg,
  projectRoot,
  appName: pkg.name,
  appVersion: pkg.version,
  appDescription: pkg.description,
  environment: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,
  logsPath: path.isAbsolute(env.LOGS_DIR)
    ? env.LOGS_DIR
    : path.resolve(projectRoot, env.LOGS_DIR),
  agentMode: env.AGENT_MODE,
  agentMaxAuthorResults: env.AGENT_MAX_AUTHOR_RESULTS,
  agentPageSize: env.AGENT_PAGE_SIZE,
  agentHistoryLimit: env.AGENT_HISTORY_LIMIT,
  resultCacheMaxEntries: env.RESULT_CACHE_MAX_ENTRIES,
  resultCacheTtlMs: env.RESULT_CACHE_TTL_MS,
  llm: {
    apiKey: env.LLM_API_KEY ?? env.GROQ_API_KEY,
    baseUrl: env.LLM_BASE_URL,
    model: env.LLM_MODEL ?? env.GROQ_MODEL ?? "llama-3.3-70b-versatile",
    timeoutMs: env.LLM_TIMEOUT_MS,
  },
  ncbiApiKey: env.NCBI_API_KEY,
  ncbiToolIdentifier:
    env.NCBI_TOOL_IDENTIFIER || `${pkg.name}/${pkg.version}`,
  ncbiAdminEmail: env.NCBI_ADMIN_EMAIL,
  // NCBI allows 3 requests/second without a key and 10 with one.
  ncbiRequestDelayMs:
    env.NCBI_REQUEST_DELAY_MS ?? (env.NCBI_API_KEY ? 100 : 334),
  ncbiTimeoutMs: env.NCBI_TIMEOUT_MS,
};

export type AppConfig = typeof config;
export type LogLevel = AppConfig["logLevel"];

export const environment: string = config.environment;
