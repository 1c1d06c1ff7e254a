/**
 * recovery of the most recently committed entry.
 *
 * only the global last entry may be edited; everything earlier is immutable.
 * every operation re-reads the store, so nothing here caches state.
 */

import { ok, err, type Result } from "neverthrow";
import { normalizeBody } from "./format.js";
import type { ScribeError } from "./errors.js";
import type { ArchivedFile, Entry, FileTouched } from "./schema.js";
import type { AssetStore, LocatedEntry, LogStore } from "./persist/index.js";

export interface ReplaceFields {
  title?: string;
  body?: string;
  filesTouched?: FileTouched[];
  related?: string[];
}

export interface DeletedEntry {
  entry: Entry;
  assetIds: string[];
}

export interface RecoveryController {
  showLast(): Result<Entry | null, ScribeError>;
  deleteLast(): Result<DeletedEntry, ScribeError>;
  replaceLast(fields: ReplaceFields): Result<Entry, ScribeError>;
  rearchive(filePath: string, description?: string): Result<Entry, ScribeError>;
  /** deletes the assets only; the entry still lists them until it is edited. */
  unarchive(): Result<DeletedEntry, ScribeError>;
}

export function createRecoveryController(logs: LogStore, assets: AssetStore): RecoveryController {
  function requireLast(): Result<LocatedEntry, ScribeError> {
    return logs.last().andThen((located) =>
      located
        ? ok(located)
        : err<LocatedEntry, ScribeError>({
            _tag: "recovery.nothing-to-delete",
            path: logs.dir,
            message: "no entries in the log",
          }),
    );
  }

  function deleteAssets(archived: ArchivedFile[]): Result<string[], ScribeError> {
    const deleted: string[] = [];
    for (const { assetId } of archived) {
      const removed = assets.delete(assetId);
      if (removed.isErr()) return err(removed.error);
      deleted.push(assetId);
    }
    return ok(deleted);
  }

  function rewrite(date: string, entry: Entry): Result<Entry, ScribeError> {
    return logs.replaceLast(date, entry).map(() => entry);
  }

  return {
    showLast() {
      return logs.last().map((located) => located?.entry ?? null);
    },

    deleteLast() {
      // log first: a crash in between leaves orphans, never a dangling reference
      return requireLast()
        .andThen(({ date }) => logs.deleteLast(date))
        .andThen((entry) => deleteAssets(entry.meta.archived).map((assetIds) => ({ entry, assetIds })));
    },

    replaceLast(fields) {
      return requireLast().andThen(({ date, entry }) => {
        const title = (fields.title ?? entry.meta.title).trim();
        if (!title) {
          return err<Entry, ScribeError>({
            _tag: "entry.invalid",
            path: entry.meta.id,
            message: `replacement for ${entry.meta.id} has an empty title`,
          });
        }

        const replacement: Entry = {
          meta: {
            ...entry.meta,
            title,
            filesTouched: fields.filesTouched ?? entry.meta.filesTouched,
            related: fields.related ?? entry.meta.related,
          },
          body: normalizeBody(fields.body ?? entry.body),
        };
        return rewrite(date, replacement);
      });
    },

    rearchive(filePath, description) {
      return requireLast().andThen(({ date, entry }) => {
        const { id, archived } = entry.meta;
        const next = description ?? archived[0]?.description ?? "";

        // the old snapshot may share the new one's name; it is then swapped in place
        const sameName = assets.assetIdFor(id, filePath);
        return assets
          .save(id, filePath)
          .orElse((e) => {
            if (e._tag !== "assets.destination-exists" || !archived.some((a) => a.assetId === sameName)) {
              return err(e);
            }
            return assets.replace(id, filePath);
          })
          .andThen((assetId) =>
            deleteAssets(archived.filter((a) => a.assetId !== assetId)).andThen(() =>
              rewrite(date, {
                meta: { ...entry.meta, archived: [{ originalPath: filePath, assetId, description: next }] },
                body: entry.body,
              }),
            ),
          );
      });
    },

    unarchive() {
      return requireLast().andThen(({ entry }) =>
        deleteAssets(entry.meta.archived).map((assetIds) => ({ entry, assetIds })),
      );
    },
  };
}
