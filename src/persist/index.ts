import type { Result } from "neverthrow";
import type { Entry } from "../schema.js";
import type { ScribeError } from "../errors.js";

export interface LocatedEntry {
  date: string;
  entry: Entry;
}

/**
 * append-only daily logs, one file per calendar date.
 * the only mutation of existing bytes is replaceLast/deleteLast on the final record.
 */
export interface LogStore {
  readonly dir: string;
  pathFor(date: string): string;
  dates(): Result<string[], ScribeError>;
  read(date: string): Result<Entry[], ScribeError>;
  find(id: string): Result<Entry | null, ScribeError>;
  /** last appended id of one date, or of the whole store when date is omitted. */
  lastEntryId(date?: string): Result<string | null, ScribeError>;
  last(): Result<LocatedEntry | null, ScribeError>;
  append(entry: Entry): Result<void, ScribeError>;
  replaceLast(date: string, entry: Entry): Result<Entry, ScribeError>;
  deleteLast(date: string): Result<Entry, ScribeError>;
}

export interface AssetStore {
  readonly dir: string;
  assetIdFor(entryId: string, sourcePath: string): string;
  exists(assetId: string): boolean;
  save(entryId: string, sourcePath: string): Result<string, ScribeError>;
  /** like save, but swaps out an existing asset of the same name in one rename. */
  replace(entryId: string, sourcePath: string): Result<string, ScribeError>;
  /** copies to destDir/_{assetId}; never overwrites. */
  restore(assetId: string, destDir: string): Result<string, ScribeError>;
  delete(assetId: string): Result<void, ScribeError>;
  list(filter?: string): Result<string[], ScribeError>;
}
