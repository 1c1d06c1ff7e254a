/**
 * integrity validator — cross-checks daily logs against the asset archive.
 * non-mutating; collects every violation instead of stopping at the first.
 */

import { basename } from "path";
import { ok, err, type Result } from "neverthrow";
import { dateOfEntryId, isValidEntryId } from "./id.js";
import type { ScribeError } from "./errors.js";
import type { Entry } from "./schema.js";
import type { AssetStore, LogStore } from "./persist/index.js";

export type Violation =
  | { _tag: "violation.corrupt-log"; file: string; message: string }
  | { _tag: "violation.invalid-id"; file: string; entryId: string; message: string }
  | { _tag: "violation.missing-asset"; file: string; entryId: string; assetId: string; message: string }
  | { _tag: "violation.orphaned-asset"; assetId: string; message: string }
  | { _tag: "violation.dangling-related"; file: string; entryId: string; relatedId: string; message: string };

export interface ValidationReport {
  entries: number;
  violations: Violation[];
}

export interface ValidateOptions {
  /**
   * incremental mode: only entries with an id after this one. orphan and
   * related checks need the whole corpus and are skipped.
   */
  since?: string;
}

export interface IntegrityValidator {
  validate(options?: ValidateOptions): Result<ValidationReport, ScribeError>;
}

interface ScannedEntry {
  file: string;
  entry: Entry;
}

export function createIntegrityValidator(logs: LogStore, assets: AssetStore): IntegrityValidator {
  return {
    validate(options: ValidateOptions = {}): Result<ValidationReport, ScribeError> {
      const { since } = options;
      const violations: Violation[] = [];
      const scanned: ScannedEntry[] = [];
      // dates whose log could not be read; their ids and assets are unknown, not missing
      const unreadable = new Set<string>();

      const dates = logs.dates();
      if (dates.isErr()) return err(dates.error);

      const sinceDate = since ? dateOfEntryId(since) : undefined;
      for (const date of dates.value) {
        if (sinceDate && date < sinceDate) continue;

        const file = basename(logs.pathFor(date));
        const entries = logs.read(date);
        if (entries.isErr()) {
          violations.push({ _tag: "violation.corrupt-log", file, message: entries.error.message });
          unreadable.add(date);
          continue;
        }

        for (const entry of entries.value) {
          if (since && entry.meta.id <= since) continue;
          scanned.push({ file, entry });
        }
      }

      for (const { file, entry } of scanned) {
        const { id } = entry.meta;

        if (!isValidEntryId(id)) {
          violations.push({
            _tag: "violation.invalid-id",
            file,
            entryId: id,
            message: `entry ${id} in ${file} has an invalid id format`,
          });
        } else if (`${dateOfEntryId(id)}.md` !== file) {
          violations.push({
            _tag: "violation.invalid-id",
            file,
            entryId: id,
            message: `entry ${id} is stored in ${file} instead of ${dateOfEntryId(id)}.md`,
          });
        }

        for (const archived of entry.meta.archived) {
          if (!assets.exists(archived.assetId)) {
            violations.push({
              _tag: "violation.missing-asset",
              file,
              entryId: id,
              assetId: archived.assetId,
              message: `asset ${archived.assetId} referenced by entry ${id} not found`,
            });
          }
        }
      }

      if (since) {
        return ok({ entries: scanned.length, violations });
      }

      const knownIds = new Set(scanned.map((s) => s.entry.meta.id));
      for (const { file, entry } of scanned) {
        for (const relatedId of entry.meta.related) {
          if (!knownIds.has(relatedId) && !unreadable.has(dateOfEntryId(relatedId))) {
            violations.push({
              _tag: "violation.dangling-related",
              file,
              entryId: entry.meta.id,
              relatedId,
              message: `entry ${entry.meta.id} relates to ${relatedId} but no such entry exists`,
            });
          }
        }
      }

      const referenced = new Set(scanned.flatMap((s) => s.entry.meta.archived.map((a) => a.assetId)));
      const stored = assets.list();
      if (stored.isErr()) return err(stored.error);

      for (const assetId of stored.value) {
        if (!referenced.has(assetId) && !unreadable.has(dateOfEntryId(assetId))) {
          violations.push({
            _tag: "violation.orphaned-asset",
            assetId,
            message: `orphaned asset ${assetId}: no entry references it`,
          });
        }
      }

      return ok({ entries: scanned.length, violations });
    },
  };
}
