import { ResultMessage } from "../types";

export type ParsedResult =
  | { valid: true; result: ResultMessage }
  | { valid: false; reason: string };

/**
 * Encode a result as a single newline-terminated JSON line
 */
export function encodeResultMessage(result: ResultMessage): string {
  const payload: ResultMessage = { ok: result.ok, message: result.message };
  if (result.detail !== undefined) {
    payload.detail = result.detail;
  }
  // JSON.stringify escapes newlines and lone surrogates, so this stays one line
  return `${JSON.stringify(payload)}\n`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse everything a runner wrote to stdout.
 * Exactly one JSON line with a boolean `ok` and a string `message` is accepted.
 */
export function parseResultMessage(raw: string): ParsedResult {
  const text = raw.trim();
  if (text === "") {
    return { valid: false, reason: "empty output" };
  }
  if (text.includes("\n")) {
    return { valid: false, reason: "more than one line of output" };
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return {
      valid: false,
      reason: error instanceof Error ? error.message : String(error),
    };
  }

  if (!isRecord(data)) {
    return { valid: false, reason: "result is not an object" };
  }
  if (typeof data.ok !== "boolean") {
    return { valid: false, reason: "`ok` is not a boolean" };
  }
  if (typeof data.message !== "string") {
    return { valid: false, reason: "`message` is not a string" };
  }
  if (data.detail !== undefined && typeof data.detail !== "string") {
    return { valid: false, reason: "`detail` is not a string" };
  }

  const result: ResultMessage = { ok: data.ok, message: data.message };
  if (typeof data.detail === "string") {
    result.detail = data.detail;
  }
  return { valid: true, result };
}
