import { formatErrorMessage } from "../errors.js";
import type { RuntimeEnv } from "../runtime.js";

/** Run a command body, reporting any error on the runtime and exiting 1. */
export async function runCommandWithRuntime(runtime: RuntimeEnv, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    runtime.error(formatErrorMessage(err));
    runtime.exit(1);
  }
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/** Variadic commander options arrive as string arrays; single values as strings. */
export function optionalStringList(value: unknown): string[] | undefined {
  if (typeof value === "string") return [value];
  if (!Array.isArray(value)) return undefined;
  const items = value.filter((v): v is string => typeof v === "string" && v.length > 0);
  return items.length > 0 ? items : undefined;
}
