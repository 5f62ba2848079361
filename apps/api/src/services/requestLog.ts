import { appendFile, mkdir, stat } from "node:fs/promises";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import type { LogEntry } from "../types/analysis";

const LOG_COLUMNS = ["timestamp", "user_text", "result"] as const;

export interface RequestLog {
  append(entry: LogEntry): Promise<void>;
}

async function isMissingOrEmpty(filePath: string): Promise<boolean> {
  try {
    const s = await stat(filePath);
    return s.size === 0;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return true;
    throw err;
  }
}

/**
 * Append-only CSV request log.
 * - UTF-8 with a BOM so spreadsheet tools pick the right encoding.
 * - Header row written once, when the file is missing or empty.
 * - Appends are chained: one row is on disk before the next append starts.
 */
export class CsvRequestLog implements RequestLog {
  private tail: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  append(entry: LogEntry): Promise<void> {
    const run = this.tail.then(() => this.write(entry));
    // The caller gets the rejection through `run`; the chain itself keeps going.
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async write(entry: LogEntry) {
    const fresh = await isMissingOrEmpty(this.filePath);
    if (fresh) await mkdir(path.dirname(this.filePath), { recursive: true });

    const row = stringify([entry], {
      header: fresh,
      bom: fresh,
      columns: [...LOG_COLUMNS],
      record_delimiter: "windows",
      quoted_match: /[\r\n]/
    });
    await appendFile(this.filePath, row, "utf8");
  }
}
