import fs from "node:fs";
import path from "node:path";
import { redactSensitiveInfo, sanitizeLogMessage } from "./security.js";

/** Append-only, one line per event: `[iso] runId=… step=… message`. */
export class ProgressLog {
  constructor(
    private readonly filePath: string,
    private readonly runId: string,
  ) {}

  write(step: string, msg: string): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const line =
      `[${new Date().toISOString()}] runId=${sanitizeLogMessage(this.runId)} ` +
      `step=${sanitizeLogMessage(step)} ${sanitizeLogMessage(redactSensitiveInfo(msg))}\n`;
    fs.appendFileSync(this.filePath, line, "utf8");
  }
}
