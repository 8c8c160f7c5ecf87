/**
 * Config file loading and validation.
 */

import { readFile } from "node:fs/promises";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { ConfigValidationError, formatErrorMessage } from "../errors.js";
import { isLogLevel } from "../logging/logger.js";
import { AppConfigSchema, DEFAULT_CONFIG, type AppConfig } from "./schema.js";

export type ConfigEnv = Record<string, string | undefined>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Merge `override` into `base`; arrays and scalars replace, objects merge. */
export function mergeConfig(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeConfig(base[key], value);
  }
  return merged;
}

function applyEnv(raw: Record<string, unknown>, env: ConfigEnv): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };

  const region = env.AWS_REGION?.trim();
  if (region && result.regions === undefined) {
    result.regions = [region];
  }

  const level = env.CLOUDTRIM_LOG_LEVEL?.trim().toLowerCase();
  if (isLogLevel(level)) {
    const logging = isPlainObject(result.logging) ? result.logging : {};
    result.logging = { ...logging, level };
  }

  return result;
}

/**
 * Resolve a raw (possibly partial) config object against defaults and the
 * environment, then validate it.
 */
export function resolveConfig(raw: unknown, env: ConfigEnv = process.env): AppConfig {
  if (raw !== undefined && !isPlainObject(raw)) {
    throw new ConfigValidationError("Invalid configuration", ["/: expected config object"]);
  }

  const merged = mergeConfig(structuredClone(DEFAULT_CONFIG), applyEnv(raw ?? {}, env));

  if (Check(AppConfigSchema, merged)) {
    if (merged.retry.maxDelayMs < merged.retry.minDelayMs) {
      throw new ConfigValidationError("Invalid configuration", [
        "/retry/maxDelayMs: must be greater than or equal to minDelayMs",
      ]);
    }
    return merged;
  }

  const errors: string[] = [];
  for (const error of Errors(AppConfigSchema, merged)) {
    errors.push(`${error.path || "/"}: ${error.message}`);
  }
  throw new ConfigValidationError("Invalid configuration", errors);
}

/**
 * Load the config file at `path` (JSON). Without a path, defaults plus
 * environment are returned.
 */
export async function loadConfig(path?: string, env: ConfigEnv = process.env): Promise<AppConfig> {
  if (!path) return resolveConfig(undefined, env);

  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigValidationError(`Cannot read config file ${path}`, [formatErrorMessage(err)]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigValidationError(`Config file ${path} is not valid JSON`, [formatErrorMessage(err)]);
  }

  return resolveConfig(raw, env);
}
