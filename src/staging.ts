/**
 * staging area — the single slot holding the entry under construction.
 *
 * prepare writes <root>/staging.md with __TITLE__/__BODY__ placeholders; an
 * external drafter fills them (directly or via fill()); finalize commits the
 * draft through the finalize machine; abort discards it. the slot lives on
 * disk so status and finalize survive a restart between prepare and finalize.
 */

import { existsSync, mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from "fs";
import { join } from "path";
import { ok, err, ResultAsync, type Result } from "neverthrow";
import { createActor, fromPromise, type Actor, type SnapshotFrom } from "xstate";
import { BODY_PLACEHOLDER, TITLE_PLACEHOLDER, parseStaging, serializeStaging, unresolvedPlaceholder } from "./format.js";
import { formatClock } from "./timestamps.js";
import { errorMessage, toScribeError, type ScribeError } from "./errors.js";
import { finalizeMachine, type FinalizeMachine } from "./machines/finalize.js";
import type { IdentifierAllocator } from "./id.js";
import type { ArchivedFile, Entry, FileTouched, PendingArchive, StagingDraft, StagingMeta, StagingMode } from "./schema.js";
import type { AssetStore, LogStore } from "./persist/index.js";
import type { IntegrityValidator, Violation } from "./validate.js";
import type { ExternalCommitProvider } from "./adapters/index.js";

export const STAGING_FILE = "staging.md";

export interface PrepareOptions {
  now?: Date;
  mode?: StagingMode;
  touched?: FileTouched[];
  archive?: PendingArchive[];
  related?: string[];
  externalState?: string;
}

export interface PreparedEntry {
  id: string;
  path: string;
}

export interface StagingRecord {
  path: string;
  meta: StagingMeta;
  body: string;
  titleFilled: boolean;
  bodyFilled: boolean;
}

export interface FinalizeOutcome {
  entry: Entry;
  assetIds: string[];
  violations: Violation[];
}

export interface StagingArea {
  readonly path: string;
  prepare(options?: PrepareOptions): Result<PreparedEntry, ScribeError>;
  status(): Result<StagingRecord | null, ScribeError>;
  /** write access for the drafting collaborator: title and body only. */
  fill(fields: { title?: string; body?: string }): Result<StagingRecord, ScribeError>;
  abort(): Result<StagingRecord | null, ScribeError>;
  finalize(): ResultAsync<FinalizeOutcome, ScribeError>;
}

export interface StagingAreaOptions {
  rootDir: string;
  allocator: IdentifierAllocator;
  logs: LogStore;
  assets: AssetStore;
  validator: IntegrityValidator;
  commitProvider?: ExternalCommitProvider;
  /** run the integrity validator after a successful append (default true). */
  verify?: boolean;
}

export function stagingPath(rootDir: string): string {
  return join(rootDir, STAGING_FILE);
}

/** id held by the staging slot, if one is outstanding and readable. */
export function readPendingId(path: string): string | null {
  if (!existsSync(path)) return null;
  try {
    const parsed = parseStaging(readFileSync(path, "utf-8"), path);
    return parsed.isOk() ? parsed.value.meta.id : null;
  } catch {
    return null;
  }
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

function toRecord(path: string, draft: StagingDraft): StagingRecord {
  const placeholder = unresolvedPlaceholder(draft);
  return {
    path,
    meta: draft.meta,
    body: draft.body,
    titleFilled: placeholder !== "title",
    bodyFilled: !draft.body.includes(BODY_PLACEHOLDER),
  };
}

function runToCompletion(actor: Actor<FinalizeMachine>): Promise<SnapshotFrom<FinalizeMachine>> {
  return new Promise((resolve, reject) => {
    actor.subscribe({
      next: (snapshot) => {
        if (snapshot.status === "done") resolve(snapshot);
      },
      error: reject,
      complete: () => resolve(actor.getSnapshot()),
    });
    actor.start();
  });
}

export function createStagingArea(options: StagingAreaOptions): StagingArea {
  const { rootDir, allocator, logs, assets, validator, commitProvider } = options;
  const verify = options.verify ?? true;
  const path = stagingPath(rootDir);

  function status(): Result<StagingRecord | null, ScribeError> {
    if (!existsSync(path)) return ok(null);

    let text: string;
    try {
      text = readFileSync(path, "utf-8");
    } catch (e) {
      return err({ _tag: "staging.parse", path, message: `${path}: ${errorMessage(e)}` });
    }
    return parseStaging(text, path).map((draft) => toRecord(path, draft));
  }

  function write(draft: StagingDraft, flag: "w" | "wx"): Result<void, ScribeError> {
    try {
      mkdirSync(rootDir, { recursive: true });
      writeFileSync(path, serializeStaging(draft), { encoding: "utf-8", flag });
      return ok(undefined);
    } catch (e) {
      return err({ _tag: "log.io", path, message: `${path}: ${errorMessage(e)}` });
    }
  }

  const machine = finalizeMachine.provide({
    actors: createFinalizeActors({ stagingPath: path, logs, assets, validator, commitProvider }),
  });

  return {
    path,

    prepare(prepareOptions: PrepareOptions = {}): Result<PreparedEntry, ScribeError> {
      if (existsSync(path)) {
        const pendingId = readPendingId(path);
        return err({
          _tag: "staging.busy",
          path,
          message: `pending entry ${pendingId ?? "(unreadable)"} exists in ${path}; finalize or abort it first`,
        });
      }

      const now = prepareOptions.now ?? new Date();
      return allocator.allocate(now).andThen((id) => {
        const draft: StagingDraft = {
          meta: {
            id,
            timestamp: formatClock(now),
            title: TITLE_PLACEHOLDER,
            filesTouched: prepareOptions.touched ?? [],
            related: prepareOptions.related ?? [],
            ...(prepareOptions.externalState !== undefined ? { externalState: prepareOptions.externalState } : {}),
            pending: {
              mode: prepareOptions.mode ?? "plain",
              archives: prepareOptions.archive ?? [],
            },
          },
          body: BODY_PLACEHOLDER,
        };

        // wx: a concurrent prepare that won the race keeps its slot
        return write(draft, "wx").map(() => ({ id, path }));
      });
    },

    status,

    fill(fields: { title?: string; body?: string }): Result<StagingRecord, ScribeError> {
      return status().andThen((record) => {
        if (!record) {
          return err<StagingRecord, ScribeError>({
            _tag: "staging.empty",
            path,
            message: "no pending entry; run prepare first",
          });
        }

        const draft: StagingDraft = {
          meta: { ...record.meta, title: fields.title ?? record.meta.title },
          body: fields.body ?? record.body,
        };
        return write(draft, "w").map(() => toRecord(path, draft));
      });
    },

    abort(): Result<StagingRecord | null, ScribeError> {
      if (!existsSync(path)) return ok(null);

      // an unreadable slot is still discarded
      const record = status();
      try {
        rmSync(path, { force: true });
      } catch (e) {
        return err({ _tag: "log.io", path, message: `${path}: ${errorMessage(e)}` });
      }
      return ok(record.isOk() ? record.value : null);
    },

    finalize(): ResultAsync<FinalizeOutcome, ScribeError> {
      return ResultAsync.fromPromise(
        (async () => {
          const current = status();
          if (current.isErr()) throw current.error;
          const record = current.value;
          if (!record) {
            throw { _tag: "staging.empty", path, message: "no pending entry; run prepare first" } satisfies ScribeError;
          }

          const actor = createActor(machine, {
            input: { stagingPath: path, draft: { meta: record.meta, body: record.body }, verify },
          });
          const snapshot = await runToCompletion(actor);
          const { entry, error, violations } = snapshot.context;

          if (error || !entry) {
            throw error ?? ({ _tag: "finalize.failed", path, message: "finalize stopped without an entry" } satisfies ScribeError);
          }

          return { entry, assetIds: entry.meta.archived.map((a) => a.assetId), violations };
        })(),
        (e) => toScribeError(e, { _tag: "finalize.failed", path }),
      );
    },
  };
}

interface FinalizeDeps {
  stagingPath: string;
  logs: LogStore;
  assets: AssetStore;
  validator: IntegrityValidator;
  commitProvider?: ExternalCommitProvider;
}

/** real implementations of the finalize machine's actors. */
function createFinalizeActors(deps: FinalizeDeps) {
  const { stagingPath: path, logs, assets, validator, commitProvider: provider } = deps;

  return {
    preflight: fromPromise<void, { draft: StagingDraft }>(async ({ input }) => {
      const seen = new Set<string>();
      for (const pending of input.draft.meta.pending.archives) {
        if (!isFile(pending.sourcePath)) {
          throw {
            _tag: "assets.source-not-found",
            path: pending.sourcePath,
            message: `${pending.sourcePath} not found (pending archive of entry ${input.draft.meta.id})`,
          } satisfies ScribeError;
        }

        const assetId = assets.assetIdFor(input.draft.meta.id, pending.sourcePath);
        if (assets.exists(assetId) || seen.has(assetId)) {
          throw {
            _tag: "assets.destination-exists",
            path: join(assets.dir, assetId),
            message: `asset ${assetId} already exists, not overwriting`,
          } satisfies ScribeError;
        }
        seen.add(assetId);
      }
    }),

    externalCommit: fromPromise<string, { title: string; body: string }>(async ({ input }) => {
      if (!provider) {
        throw { _tag: "commit.failed", path, message: "entry requests an external commit but no provider is configured" } satisfies ScribeError;
      }
      return provider.commit(input.title, input.body);
    }),

    archive: fromPromise<ArchivedFile[], { draft: StagingDraft }>(async ({ input }) => {
      const { meta } = input.draft;
      const archived: ArchivedFile[] = [];

      for (const pending of meta.pending.archives) {
        const saved = assets.save(meta.id, pending.sourcePath);
        if (saved.isErr()) {
          // all-or-nothing: drop whatever this run already copied
          for (const done of archived) assets.delete(done.assetId);
          throw saved.error;
        }
        archived.push({ originalPath: pending.sourcePath, assetId: saved.value, description: pending.description });
      }
      return archived;
    }),

    append: fromPromise<Entry, { entry: Entry }>(async ({ input }) => {
      const appended = logs.append(input.entry);
      if (appended.isErr()) {
        for (const done of input.entry.meta.archived) assets.delete(done.assetId);
        throw appended.error;
      }
      return input.entry;
    }),

    clear: fromPromise<void, void>(async () => {
      rmSync(path, { force: true });
    }),

    verify: fromPromise<Violation[], void>(async () => {
      const report = validator.validate();
      if (report.isErr()) throw report.error;
      return report.value.violations;
    }),
  };
}
