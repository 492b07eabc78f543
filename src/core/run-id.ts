import crypto from "node:crypto";

/** `YYYYMMDD_HHMMSS` in local time, the stamp used for run ids and backup names. */
export function timestampStamp(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${date}_${time}`;
}

/**
 * Generate a run ID.
 * Format: {YYYYMMDD_HHMMSS}-{hex4}
 */
export function generateRunId(now: Date = new Date()): string {
  return `${timestampStamp(now)}-${crypto.randomBytes(2).toString("hex")}`;
}
