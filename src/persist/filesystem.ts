/**
 * file-based daily log store.
 * layout: <root>/YYYY-MM-DD.md, records appended in ascending id order.
 */

import { appendFileSync, existsSync, mkdirSync, readdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { ok, err, type Result } from "neverthrow";
import { dateOfEntryId, isValidEntryId } from "../id.js";
import { dailyLogHeader, parseDailyLog, recordOffsets, serializeEntry } from "../format.js";
import { errorMessage, type ScribeError } from "../errors.js";
import type { Entry } from "../schema.js";
import type { LocatedEntry, LogStore } from "./index.js";

const LOG_FILE_PATTERN = /^(\d{4}-\d{2}-\d{2})\.md$/;

interface FileLogStoreOptions {
  rootDir: string;
}

function ioError(path: string, e: unknown): ScribeError {
  return { _tag: "log.io", path, message: `${path}: ${errorMessage(e)}` };
}

function readText(path: string): Result<string | null, ScribeError> {
  if (!existsSync(path)) return ok(null);
  try {
    return ok(readFileSync(path, "utf-8"));
  } catch (e) {
    return err(ioError(path, e));
  }
}

function writeAtomic(path: string, content: string): Result<void, ScribeError> {
  const tempPath = `${path}.tmp.${process.pid}.${Date.now()}`;
  try {
    writeFileSync(tempPath, content, "utf-8");
    renameSync(tempPath, path);
    return ok(undefined);
  } catch (e) {
    rmSync(tempPath, { force: true });
    return err(ioError(path, e));
  }
}

export function createFileLogStore(options: FileLogStoreOptions): LogStore {
  const rootDir = options.rootDir;

  function pathFor(date: string): string {
    return join(rootDir, `${date}.md`);
  }

  function read(date: string): Result<Entry[], ScribeError> {
    const path = pathFor(date);
    return readText(path).andThen((text) => (text === null ? ok([]) : parseDailyLog(text, path)));
  }

  function dates(): Result<string[], ScribeError> {
    if (!existsSync(rootDir)) return ok([]);
    try {
      const found: string[] = [];
      for (const file of readdirSync(rootDir)) {
        const match = file.match(LOG_FILE_PATTERN);
        if (match?.[1]) found.push(match[1]);
      }
      return ok(found.sort());
    } catch (e) {
      return err(ioError(rootDir, e));
    }
  }

  function last(): Result<LocatedEntry | null, ScribeError> {
    const all = dates();
    if (all.isErr()) return err(all.error);

    for (const date of [...all.value].reverse()) {
      const entries = read(date);
      if (entries.isErr()) return err(entries.error);
      const entry = entries.value.at(-1);
      if (entry) return ok({ date, entry });
    }
    return ok(null);
  }

  /** file text split at the start of its final record. */
  function splitLast(date: string): Result<{ text: string; start: number; entry: Entry }, ScribeError> {
    const path = pathFor(date);
    const nothing: ScribeError = {
      _tag: "recovery.nothing-to-delete",
      path,
      message: `no entries in daily log ${date}`,
    };

    return readText(path).andThen((text) => {
      if (text === null) return err(nothing);
      return parseDailyLog(text, path).andThen((entries) => {
        const entry = entries.at(-1);
        const start = recordOffsets(text).at(-1);
        if (!entry || start === undefined) return err(nothing);
        return ok({ text, start, entry });
      });
    });
  }

  return {
    dir: rootDir,

    pathFor,

    dates,

    read,

    find(id: string): Result<Entry | null, ScribeError> {
      if (!isValidEntryId(id)) return ok(null);
      return read(dateOfEntryId(id)).map((entries) => entries.find((e) => e.meta.id === id) ?? null);
    },

    lastEntryId(date?: string): Result<string | null, ScribeError> {
      if (date === undefined) {
        return last().map((located) => located?.entry.meta.id ?? null);
      }
      return read(date).map((entries) => entries.at(-1)?.meta.id ?? null);
    },

    last,

    append(entry: Entry): Result<void, ScribeError> {
      const { id } = entry.meta;
      if (!isValidEntryId(id)) {
        return err({ _tag: "id.invalid", path: id, message: `invalid entry id format: ${id}` });
      }

      const path = pathFor(dateOfEntryId(id));
      try {
        if (!existsSync(rootDir)) {
          mkdirSync(rootDir, { recursive: true });
        }
        if (!existsSync(path)) {
          writeFileSync(path, dailyLogHeader(dateOfEntryId(id)), "utf-8");
        }
        appendFileSync(path, `\n${serializeEntry(entry)}`, "utf-8");
        return ok(undefined);
      } catch (e) {
        return err(ioError(path, e));
      }
    },

    replaceLast(date: string, entry: Entry): Result<Entry, ScribeError> {
      return splitLast(date).andThen(({ text, start, entry: previous }) => {
        if (previous.meta.id !== entry.meta.id) {
          return err<Entry, ScribeError>({
            _tag: "entry.invalid",
            path: entry.meta.id,
            message: `replacement id ${entry.meta.id} does not match last entry ${previous.meta.id}`,
          });
        }
        return writeAtomic(pathFor(date), text.slice(0, start) + serializeEntry(entry)).map(() => previous);
      });
    },

    deleteLast(date: string): Result<Entry, ScribeError> {
      // append wrote "\n" + record; dropping both restores the earlier bytes exactly
      return splitLast(date).andThen(({ text, start, entry }) =>
        writeAtomic(pathFor(date), text.slice(0, start).replace(/\n$/, "")).map(() => entry),
      );
    },
  };
}
