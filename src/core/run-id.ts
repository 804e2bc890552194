import crypto from "node:crypto";

/** Run id: sortable timestamp plus random suffix, e.g. 2026-01-02T03-04-05-678Z-1a2b3c4d5e6f. */
export function makeRunId(now: Date = new Date()): string {
  const ts = now.toISOString().replace(/[:.]/g, "-");
  return `${ts}-${crypto.randomBytes(6).toString("hex")}`;
}
