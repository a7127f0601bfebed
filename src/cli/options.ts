import type { ReportFormat } from "../report/types.js";
import type { ShowSection } from "./scan-command.js";

export function parseFormat(value: string): ReportFormat {
  if (value === "text" || value === "json" || value === "sarif") {
    return value;
  }
  throw new Error(`Unsupported format: ${value} (expected text, json or sarif)`);
}

export function parseRulesFormat(value: string): "text" | "json" {
  if (value === "text" || value === "json") {
    return value;
  }
  throw new Error(`Unsupported format: ${value} (expected text or json)`);
}

export function parseShow(value: string): ShowSection {
  if (value === "summary" || value === "findings" || value === "all") {
    return value;
  }
  throw new Error(`Unsupported --show value: ${value}`);
}

/** Comma separated; blanks are dropped. */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseNonNegativeInteger(
  value: string | undefined,
  flag: string,
  max = Number.MAX_SAFE_INTEGER,
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${flag} must be a non-negative integer, got ${value}`);
  }
  if (parsed > max) {
    throw new Error(`${flag} must not exceed ${max}, got ${value}`);
  }
  return parsed;
}
