/**
 * entry ids: YYYY-MM-DD-HH-MM, with -02 … -99 appended on same-minute collisions.
 * zero-padded so lexicographic order is chronological (and allocation order
 * within a minute, since the bare id sorts before its suffixed siblings).
 */

import { ok, err, type Result } from "neverthrow";
import { formatBaseId, formatDate } from "./timestamps.js";
import type { ScribeError } from "./errors.js";
import type { LogStore } from "./persist/index.js";

export const ENTRY_ID_PATTERN = /^\d{4}-\d{2}-\d{2}-\d{2}-\d{2}(-(0[2-9]|[1-9]\d))?$/;

export const MAX_SUFFIX = 99;

export function isValidEntryId(id: string): boolean {
  return ENTRY_ID_PATTERN.test(id);
}

/** YYYY-MM-DD portion; names the daily log holding the entry. */
export function dateOfEntryId(id: string): string {
  return id.slice(0, 10);
}

export function allocateId(time: Date, taken: Iterable<string>): Result<string, ScribeError> {
  const base = formatBaseId(time);
  const used = new Set(taken);

  if (!used.has(base)) return ok(base);

  for (let suffix = 2; suffix <= MAX_SUFFIX; suffix++) {
    const candidate = `${base}-${String(suffix).padStart(2, "0")}`;
    if (!used.has(candidate)) return ok(candidate);
  }

  return err({
    _tag: "id.exhausted",
    path: base,
    message: `no free id left for minute ${base} (suffixes -02 to -${MAX_SUFFIX} taken)`,
  });
}

export interface IdentifierAllocator {
  allocate(time: Date): Result<string, ScribeError>;
}

/**
 * allocator over the daily log of the requested date.
 * reserved() reports an id held by an uncommitted staging record, so allocating
 * again before it is finalized cannot hand out the same id.
 */
export function createIdentifierAllocator(
  logs: LogStore,
  reserved: () => string | null = () => null,
): IdentifierAllocator {
  return {
    allocate(time: Date): Result<string, ScribeError> {
      return logs.read(formatDate(time)).andThen((entries) => {
        const taken = entries.map((e) => e.meta.id);
        const pending = reserved();
        if (pending) taken.push(pending);
        return allocateId(time, taken);
      });
    },
  };
}
