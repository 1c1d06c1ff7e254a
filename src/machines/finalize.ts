/**
 * finalize machine — turns the staged draft into a committed entry.
 *
 * side effects are actors injected via machine.provide(); the machine only
 * sequences them. everything before "appending" is all-or-nothing: a failure
 * there leaves the log, the archive and the staging slot untouched.
 *
 * states: checkPlaceholders → preflight → [committing] → archiving → appending → clearing → [verifying] → completed | failed
 */

import { setup, assign, fromPromise } from "xstate";
import { BODY_PLACEHOLDER, TITLE_PLACEHOLDER, normalizeBody, unresolvedPlaceholder } from "../format.js";
import { toScribeError, type ScribeError } from "../errors.js";
import type { ArchivedFile, Entry, StagingDraft } from "../schema.js";
import type { Violation } from "../validate.js";

export interface FinalizeContext {
  stagingPath: string;
  verify: boolean;
  draft: StagingDraft;
  externalState: string | undefined;
  archived: ArchivedFile[];
  entry: Entry | null;
  violations: Violation[];
  error?: ScribeError;
}

export interface FinalizeInput {
  stagingPath: string;
  draft: StagingDraft;
  verify: boolean;
}

export function buildEntry(
  draft: StagingDraft,
  archived: ArchivedFile[],
  externalState: string | undefined,
): Entry {
  const { meta } = draft;
  return {
    meta: {
      id: meta.id,
      timestamp: meta.timestamp,
      title: meta.title.trim(),
      filesTouched: meta.filesTouched,
      archived,
      related: meta.related,
      ...(externalState !== undefined ? { externalState } : {}),
    },
    body: normalizeBody(draft.body),
  };
}

function placeholderError(context: FinalizeContext): ScribeError {
  const field = unresolvedPlaceholder(context.draft) ?? "title";
  const path = context.stagingPath;
  if (field === "body") {
    return { _tag: "staging.placeholder", path, field, message: `body placeholder (${BODY_PLACEHOLDER}) not replaced in ${path}` };
  }
  const message = context.draft.meta.title.trim()
    ? `title placeholder (${TITLE_PLACEHOLDER}) not replaced in ${path}`
    : `title is empty in ${path}`;
  return { _tag: "staging.placeholder", path, field, message };
}

const preflightActor = fromPromise<void, { draft: StagingDraft }>(async () => {
  throw new Error("preflight: not provided via machine.provide()");
});

const externalCommitActor = fromPromise<string, { title: string; body: string }>(async () => {
  throw new Error("externalCommit: not provided via machine.provide()");
});

const archiveActor = fromPromise<ArchivedFile[], { draft: StagingDraft }>(async () => {
  throw new Error("archive: not provided via machine.provide()");
});

const appendActor = fromPromise<Entry, { entry: Entry }>(async () => {
  throw new Error("append: not provided via machine.provide()");
});

const clearActor = fromPromise<void, void>(async () => {
  throw new Error("clear: not provided via machine.provide()");
});

const verifyActor = fromPromise<Violation[], void>(async () => {
  throw new Error("verify: not provided via machine.provide()");
});

export const finalizeMachine = setup({
  types: {
    context: {} as FinalizeContext,
    input: {} as FinalizeInput,
  },
  actors: {
    preflight: preflightActor,
    externalCommit: externalCommitActor,
    archive: archiveActor,
    append: appendActor,
    clear: clearActor,
    verify: verifyActor,
  },
  actions: {
    assignExternalState: assign({
      externalState: (_, params: { externalState: string }) => params.externalState,
    }),
    assignArchived: assign({
      archived: (_, params: { archived: ArchivedFile[] }) => params.archived,
    }),
    assignEntry: assign({
      entry: (_, params: { entry: Entry }) => params.entry,
    }),
    assignViolations: assign({
      violations: (_, params: { violations: Violation[] }) => params.violations,
    }),
    assignError: assign({
      error: (_, params: { error: ScribeError }) => params.error,
    }),
  },
  guards: {
    hasUnresolvedPlaceholder: ({ context }) => unresolvedPlaceholder(context.draft) !== null,
    isExternalCommit: ({ context }) => context.draft.meta.pending.mode === "external-commit",
    shouldVerify: ({ context }) => context.verify,
  },
}).createMachine({
  id: "finalize",
  initial: "checkPlaceholders",
  context: ({ input }) => ({
    stagingPath: input.stagingPath,
    verify: input.verify,
    draft: input.draft,
    externalState: input.draft.meta.externalState,
    archived: [],
    entry: null,
    violations: [],
  }),

  states: {
    checkPlaceholders: {
      always: [
        {
          guard: "hasUnresolvedPlaceholder",
          target: "failed",
          actions: assign(({ context }) => ({ error: placeholderError(context) })),
        },
        { target: "preflight" },
      ],
    },

    preflight: {
      invoke: {
        id: "preflight",
        src: "preflight",
        input: ({ context }) => ({ draft: context.draft }),
        onDone: [
          { guard: "isExternalCommit", target: "committing" },
          { target: "archiving" },
        ],
        onError: {
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ event }) => ({
              error: toScribeError(event.error, { _tag: "assets.io", path: "preflight" }),
            }),
          },
        },
      },
    },

    committing: {
      invoke: {
        id: "externalCommit",
        src: "externalCommit",
        input: ({ context }) => ({
          title: context.draft.meta.title.trim(),
          body: normalizeBody(context.draft.body),
        }),
        onDone: {
          target: "archiving",
          actions: {
            type: "assignExternalState",
            params: ({ event }) => ({ externalState: event.output }),
          },
        },
        onError: {
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ event }) => ({
              error: toScribeError(event.error, { _tag: "commit.failed", path: "externalCommit" }),
            }),
          },
        },
      },
    },

    archiving: {
      invoke: {
        id: "archive",
        src: "archive",
        input: ({ context }) => ({ draft: context.draft }),
        onDone: {
          target: "appending",
          actions: {
            type: "assignArchived",
            params: ({ event }) => ({ archived: event.output }),
          },
        },
        onError: {
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ event }) => ({
              error: toScribeError(event.error, { _tag: "assets.io", path: "archive" }),
            }),
          },
        },
      },
    },

    appending: {
      invoke: {
        id: "append",
        src: "append",
        input: ({ context }) => ({
          entry: buildEntry(context.draft, context.archived, context.externalState),
        }),
        onDone: {
          target: "clearing",
          actions: {
            type: "assignEntry",
            params: ({ event }) => ({ entry: event.output }),
          },
        },
        onError: {
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ event }) => ({
              error: toScribeError(event.error, { _tag: "log.io", path: "append" }),
            }),
          },
        },
      },
    },

    // past this point the entry is committed; failures are reported, not rolled back
    clearing: {
      invoke: {
        id: "clear",
        src: "clear",
        onDone: [
          { guard: "shouldVerify", target: "verifying" },
          { target: "completed" },
        ],
        onError: {
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ event }) => ({
              error: toScribeError(event.error, { _tag: "finalize.failed", path: "clear" }),
            }),
          },
        },
      },
    },

    verifying: {
      invoke: {
        id: "verify",
        src: "verify",
        onDone: {
          target: "completed",
          actions: {
            type: "assignViolations",
            params: ({ event }) => ({ violations: event.output }),
          },
        },
        onError: {
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ event }) => ({
              error: toScribeError(event.error, { _tag: "finalize.failed", path: "verify" }),
            }),
          },
        },
      },
    },

    completed: {
      type: "final",
    },

    failed: {
      type: "final",
    },
  },
});

export type FinalizeMachine = typeof finalizeMachine;
