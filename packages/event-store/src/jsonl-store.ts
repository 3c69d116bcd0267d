/**
 * @tallybridge/event-store: File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append is written in a single call and fsynced before returning
 * - A torn final line (unclean shutdown) is cut from the file on load, so
 *   the next append starts on a fresh line
 * - Any other unreadable line aborts the load with CORRUPT_LOG
 *
 * Hash mismatches are not rejected on load; `verifyIntegrity()` reports
 * them so the operator can inspect the file.
 *
 * File format (one StoredEvent per line):
 * {"event":{...},"streamId":"...","version":1,"globalPosition":1,"appendedAt":"...","hash":"...","previousHash":"..."}
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  truncateSync,
} from "node:fs";
import { dirname } from "node:path";
import { isDomainEvent, isRecord } from "@tallybridge/types";
import type { StoredEvent } from "./types.js";
import { EventStoreError } from "./types.js";
import { IndexedEventStore } from "./indexed-store.js";
import type { IndexedEventStoreOptions } from "./indexed-store.js";

export interface JsonlEventStoreOptions extends IndexedEventStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

/**
 * File-based JSONL event store.
 *
 * The in-memory index is rebuilt from the file on construction.
 * The parent directory is created if it doesn't exist.
 */
export class JsonlEventStore extends IndexedEventStore {
  private readonly _filePath: string;
  private _truncatedBytes = 0;

  constructor(options: JsonlEventStoreOptions) {
    super(options);
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._load();
  }

  get filePath(): string {
    return this._filePath;
  }

  /** Bytes of torn tail cut from the file when it was loaded. */
  get truncatedBytes(): number {
    return this._truncatedBytes;
  }

  protected override persist(events: readonly StoredEvent[]): void {
    const data = events.map((e) => JSON.stringify(e) + "\n").join("");
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  // ─── Load ───────────────────────────────────────────────────────────

  private _load(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    const lines = content.split("\n");
    let lineStart = 0;

    for (let i = 0; i < lines.length; i++) {
      const raw = lines[i] ?? "";
      const start = lineStart;
      lineStart += raw.length + 1;

      const line = raw.trim();
      if (line.length === 0) continue;

      const record = parseLine(line);
      if (record === undefined) {
        if (lines.slice(i + 1).every((rest) => rest.trim().length === 0)) {
          this._cutTornTail(content, start);
          return;
        }
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Unreadable event record on line ${i + 1} of ${this._filePath}`,
        );
      }

      const expectedPosition = this.globalPosition() + 1;
      const expectedVersion = this.streamVersion(record.streamId) + 1;
      if (record.globalPosition !== expectedPosition || record.version !== expectedVersion) {
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Out-of-order event on line ${i + 1}: position ${record.globalPosition} (expected ${expectedPosition}), version ${record.version} (expected ${expectedVersion})`,
          record.streamId,
        );
      }

      this.index(record);
    }

    if (content.length > 0 && !content.endsWith("\n")) {
      appendFileSync(this._filePath, "\n", "utf-8");
    }
  }

  private _cutTornTail(content: string, tailStart: number): void {
    const keep = Buffer.byteLength(content.slice(0, tailStart), "utf-8");
    this._truncatedBytes = Buffer.byteLength(content, "utf-8") - keep;
    truncateSync(this._filePath, keep);
  }
}

function parseLine(line: string): StoredEvent | undefined {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return undefined;
  }
  return isStoredEvent(value) ? value : undefined;
}

function isStoredEvent(value: unknown): value is StoredEvent {
  if (!isRecord(value)) return false;
  return (
    isDomainEvent(value.event) &&
    typeof value.streamId === "string" &&
    value.streamId.length > 0 &&
    typeof value.version === "number" &&
    typeof value.globalPosition === "number" &&
    typeof value.appendedAt === "string" &&
    typeof value.hash === "string" &&
    typeof value.previousHash === "string"
  );
}
