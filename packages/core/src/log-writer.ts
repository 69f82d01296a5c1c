/**
 * Append-only JSONL writer with size-based rotation.
 *
 * Used for the application log and for the raw API audit trail. Writes are
 * synchronous so entries land in order even when the process exits right
 * after logging. A failed write is dropped; logging never takes the caller
 * down with it.
 */

import {
  appendFileSync,
  existsSync,
  mkdirSync,
  renameSync,
  statSync,
  unlinkSync,
} from "node:fs";
import { dirname, extname } from "node:path";
import type { LogLevel } from "./types.js";

export interface LogEntry {
  ts: string;
  level: LogLevel;
  source: string;
  sessionId: string | null;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogWriterOptions {
  filePath: string;
  /** Rotate once the file reaches this size. Defaults to 10 MiB. */
  maxSizeBytes?: number;
  /** Rotated files to keep (app.1.jsonl … app.N.jsonl). Defaults to 3. */
  maxBackups?: number;
}

const DEFAULT_MAX_SIZE_BYTES = 10 * 1024 * 1024;
const DEFAULT_MAX_BACKUPS = 3;

export class LogWriter {
  readonly filePath: string;
  private readonly maxSizeBytes: number;
  private readonly maxBackups: number;
  private closed = false;

  constructor(options: LogWriterOptions) {
    this.filePath = options.filePath;
    this.maxSizeBytes = options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES;
    this.maxBackups = options.maxBackups ?? DEFAULT_MAX_BACKUPS;
    mkdirSync(dirname(this.filePath), { recursive: true });
  }

  append(entry: LogEntry): void {
    this.appendRecord(entry);
  }

  appendLine(message: string, level: LogLevel, source: string, sessionId?: string): void {
    this.append({
      ts: new Date().toISOString(),
      level,
      source,
      sessionId: sessionId ?? null,
      message,
    });
  }

  /** Append an arbitrary JSON object as one line. */
  appendRecord(record: object): void {
    if (this.closed) return;
    try {
      this.rotateIfNeeded();
      appendFileSync(this.filePath, JSON.stringify(record) + "\n", "utf-8");
    } catch {
      // Unwritable log location: drop the entry.
    }
  }

  close(): void {
    this.closed = true;
  }

  private rotateIfNeeded(): void {
    if (!existsSync(this.filePath)) return;
    if (statSync(this.filePath).size < this.maxSizeBytes) return;

    const oldest = this.backupPath(this.maxBackups);
    if (existsSync(oldest)) unlinkSync(oldest);

    for (let i = this.maxBackups - 1; i >= 1; i--) {
      const from = this.backupPath(i);
      if (existsSync(from)) renameSync(from, this.backupPath(i + 1));
    }

    if (this.maxBackups > 0) {
      renameSync(this.filePath, this.backupPath(1));
    } else {
      unlinkSync(this.filePath);
    }
  }

  /** app.jsonl -> app.<n>.jsonl */
  private backupPath(n: number): string {
    const ext = extname(this.filePath);
    const base = ext ? this.filePath.slice(0, -ext.length) : this.filePath;
    return `${base}.${n}${ext}`;
  }
}
