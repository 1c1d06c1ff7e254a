/**
 * archive of file snapshots tied to entries.
 * asset names: {entryId}-{basename}; restored copies: _{assetId}.
 * neither save nor restore ever replaces an existing file; replace swaps one
 * in through a temp file and a rename.
 */

import { constants, copyFileSync, existsSync, mkdirSync, readdirSync, renameSync, rmSync, statSync } from "fs";
import { basename, join } from "path";
import { ok, err, type Result } from "neverthrow";
import { isValidEntryId } from "../id.js";
import { errorMessage, type ScribeError } from "../errors.js";
import type { AssetStore } from "./index.js";

interface FileAssetStoreOptions {
  assetsDir: string;
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

function copyExclusive(src: string, dest: string): Result<void, ScribeError> {
  try {
    copyFileSync(src, dest, constants.COPYFILE_EXCL);
    return ok(undefined);
  } catch (e) {
    if (existsSync(dest)) {
      return err({
        _tag: "assets.destination-exists",
        path: dest,
        message: `${dest} already exists, not overwriting`,
      });
    }
    return err({ _tag: "assets.io", path: dest, message: `copy to ${dest} failed: ${errorMessage(e)}` });
  }
}

export function createFileAssetStore(options: FileAssetStoreOptions): AssetStore {
  const assetsDir = options.assetsDir;

  function assetIdFor(entryId: string, sourcePath: string): string {
    return `${entryId}-${basename(sourcePath)}`;
  }

  function checkSource(entryId: string, sourcePath: string): Result<string, ScribeError> {
    if (!isValidEntryId(entryId)) {
      return err({
        _tag: "id.invalid",
        path: entryId,
        message: `invalid entry id format: ${entryId} (expected YYYY-MM-DD-HH-MM, e.g. 2026-01-23-14-35)`,
      });
    }

    if (!isFile(sourcePath)) {
      return err({ _tag: "assets.source-not-found", path: sourcePath, message: `${sourcePath} not found` });
    }

    return ok(assetIdFor(entryId, sourcePath));
  }

  function ensureDir(): Result<void, ScribeError> {
    try {
      mkdirSync(assetsDir, { recursive: true });
      return ok(undefined);
    } catch (e) {
      return err({ _tag: "assets.io", path: assetsDir, message: `${assetsDir}: ${errorMessage(e)}` });
    }
  }

  return {
    dir: assetsDir,

    assetIdFor,

    exists(assetId: string): boolean {
      return isFile(join(assetsDir, assetId));
    },

    save(entryId: string, sourcePath: string): Result<string, ScribeError> {
      return checkSource(entryId, sourcePath).andThen((assetId) => {
        const dest = join(assetsDir, assetId);
        if (existsSync(dest)) {
          return err<string, ScribeError>({
            _tag: "assets.destination-exists",
            path: dest,
            message: `asset ${assetId} already exists, not overwriting`,
          });
        }

        return ensureDir()
          .andThen(() => copyExclusive(sourcePath, dest))
          .map(() => assetId);
      });
    },

    replace(entryId: string, sourcePath: string): Result<string, ScribeError> {
      return checkSource(entryId, sourcePath).andThen((assetId) =>
        ensureDir().andThen(() => {
          const dest = join(assetsDir, assetId);
          const tempPath = `${dest}.tmp.${process.pid}`;
          try {
            copyFileSync(sourcePath, tempPath);
            renameSync(tempPath, dest);
            return ok(assetId);
          } catch (e) {
            rmSync(tempPath, { force: true });
            return err<string, ScribeError>({
              _tag: "assets.io",
              path: dest,
              message: `replace ${assetId} failed: ${errorMessage(e)}`,
            });
          }
        }),
      );
    },

    restore(assetId: string, destDir: string): Result<string, ScribeError> {
      const src = join(assetsDir, assetId);
      if (!isFile(src)) {
        return err({ _tag: "assets.source-not-found", path: src, message: `asset ${assetId} not found in archive` });
      }

      const dest = join(destDir, `_${assetId}`);
      if (existsSync(dest)) {
        return err({
          _tag: "assets.destination-exists",
          path: dest,
          message: `${dest} already exists, not overwriting`,
        });
      }

      return copyExclusive(src, dest).map(() => dest);
    },

    delete(assetId: string): Result<void, ScribeError> {
      const path = join(assetsDir, assetId);
      try {
        rmSync(path, { force: true });
        return ok(undefined);
      } catch (e) {
        return err({ _tag: "assets.io", path, message: `delete ${assetId} failed: ${errorMessage(e)}` });
      }
    },

    list(filter?: string): Result<string[], ScribeError> {
      if (!existsSync(assetsDir)) return ok([]);

      try {
        const needle = filter?.toLowerCase();
        const names = readdirSync(assetsDir, { withFileTypes: true })
          .filter((d) => d.isFile())
          .map((d) => d.name)
          .filter((name) => !needle || name.toLowerCase().includes(needle));
        return ok(names.sort());
      } catch (e) {
        return err({ _tag: "assets.io", path: assetsDir, message: `${assetsDir}: ${errorMessage(e)}` });
      }
    },
  };
}
