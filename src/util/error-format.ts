import { SizedLruError } from "../cache/errors.js";

// One-line rendering for job failure output.
export function formatError(err: unknown): string {
  if (err instanceof SizedLruError) {
    const details = Object.keys(err.details).length > 0 ? ` ${JSON.stringify(err.details)}` : "";
    return `${err.code}: ${err.message}${details}`;
  }
  if (err instanceof Error) return err.message.trim() || err.name;
  const s = String(err ?? "").trim();
  return s.length > 0 ? s : "unknown_error";
}
