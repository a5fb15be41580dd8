import dotenv from "dotenv";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { LogLevel } from "./logger.js";
import type { Issue } from "./types.js";

/**
 * Module: Configuration
 * Purpose: Read catalog settings from the environment (optionally seeded from `.env`)
 * and validate them once at startup.
 */
const TRUE_WORDS = ["true", "1", "yes", "on"];
const FALSE_WORDS = ["false", "0", "no", "off"];

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => TRUE_WORDS.includes(v) || FALSE_WORDS.includes(v), { message: "expected true/false" })
  .transform((v) => TRUE_WORDS.includes(v));

const ConfigSchema = z.object({
  CATALOG_DB_PATH: z.string().trim().min(1).default("components.db"),
  CATALOG_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  CATALOG_AUTO_CATEGORIZE: booleanFlag.default("false"),
});

export interface CatalogConfig {
  dbPath: string;
  logLevel: LogLevel;
  autoCategorize: boolean;
}

const toIssue = (issue: z.ZodIssue): Issue => ({
  field: issue.path.join(".") || "env",
  code: "E_CONFIG",
  msg: issue.message,
  level: "error",
});

export function loadConfig(env: Record<string, string | undefined> = process.env): CatalogConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map(toIssue));
  }
  return {
    dbPath: parsed.data.CATALOG_DB_PATH,
    logLevel: parsed.data.CATALOG_LOG_LEVEL,
    autoCategorize: parsed.data.CATALOG_AUTO_CATEGORIZE,
  };
}

/**
 * Load `.env` from the working directory (without overriding variables already set)
 * and return the validated configuration.
 */
export function loadConfigFromEnvFile(path?: string): CatalogConfig {
  dotenv.config(path ? { path } : undefined);
  return loadConfig(process.env);
}
