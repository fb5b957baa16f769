/**
 * @scevents/event-store — File-backed OutputEventStore.
 *
 * Each event is one line of the record encoding (see encodeOutputEvent)
 * in a `.jsonl` file; the in-memory index is rebuilt from it on startup.
 *
 * Crash safety:
 * - Each append is written in one call and fsynced before the index changes
 * - Torn or corrupt lines are skipped (and logged) on load
 *
 * Appends only ever add lines. Pruning bounds the in-memory index;
 * pruned events stay in the file, and load replays the lines one by one,
 * pruning after each, so the index ends up as it was before the restart.
 * clear() truncates the file.
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  ftruncateSync,
} from "node:fs";
import { dirname } from "node:path";
import { decodeOutputEvent, encodeOutputEvent } from "@scevents/models";
import type { OutputEvent } from "@scevents/models";
import { InMemoryOutputEventStore } from "./in-memory-store.js";
import type { OutputEventStoreOptions } from "./in-memory-store.js";

export interface JsonlOutputEventStoreOptions extends OutputEventStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

export class JsonlOutputEventStore extends InMemoryOutputEventStore {
  private readonly _filePath: string;

  /**
   * Opens the file at `filePath`, creating its directory if needed.
   * The file itself is created on first append.
   */
  constructor(options: JsonlOutputEventStoreOptions) {
    super(options);
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  protected override _persist(events: readonly OutputEvent[]): void {
    const lines = events.map((event) => encodeOutputEvent(event) + "\n").join("");
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, lines, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  /**
   * Drop every event from memory and truncate the file.
   */
  override clear(): void {
    const fd = openSync(this._filePath, "a");
    try {
      ftruncateSync(fd, 0);
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    super.clear();
    this._logger.info({ filePath: this._filePath }, "Cleared output events");
  }

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const lines = readFileSync(this._filePath, "utf-8").split("\n");
    let loaded = 0;
    let skipped = 0;
    let pruned = 0;

    lines.forEach((line, i) => {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        return;
      }
      try {
        const event = decodeOutputEvent(trimmed);
        this._index.validate([event]);
        this._index.insert([event]);
        pruned += this._index.prune(this._config.maxEvents);
        loaded++;
      } catch (err) {
        skipped++;
        this._logger.warn(
          { line: i + 1, err, filePath: this._filePath },
          "Skipped unreadable output event line",
        );
      }
    });

    this._logger.info(
      { loaded, skipped, pruned, filePath: this._filePath },
      "Loaded output events",
    );
  }
}
