/**
 * schemas for committed entries and the staging record.
 *
 * entry metadata lives in a JSON header above each record; the title lives in
 * the record's "## HH:MM — title" heading and the body below it. the header
 * schemas therefore omit title, which is attached at parse time.
 */

import { type } from "arktype";

export const FileTouchedSchema = type({
  path: "string",
  description: "string",
});

export type FileTouched = typeof FileTouchedSchema.infer;

export const ArchivedFileSchema = type({
  originalPath: "string",
  assetId: "string",
  description: "string",
});

export type ArchivedFile = typeof ArchivedFileSchema.infer;

export const PendingArchiveSchema = type({
  sourcePath: "string",
  description: "string",
});

export type PendingArchive = typeof PendingArchiveSchema.infer;

export const EntryHeaderSchema = type({
  id: "string",
  timestamp: "string",
  filesTouched: FileTouchedSchema.array(),
  archived: ArchivedFileSchema.array(),
  related: "string[]",
  "externalState?": "string",
});

export type EntryHeader = typeof EntryHeaderSchema.infer;

export type StagingMode = "plain" | "external-commit";

export const StagingHeaderSchema = type({
  id: "string",
  timestamp: "string",
  filesTouched: FileTouchedSchema.array(),
  related: "string[]",
  "externalState?": "string",
  pending: {
    mode: "'plain' | 'external-commit'",
    archives: PendingArchiveSchema.array(),
  },
});

export type StagingHeader = typeof StagingHeaderSchema.infer;

/**
 * committed entry metadata.
 * externalState is opaque (e.g. a commit hash) and never interpreted here.
 */
export interface EntryMeta {
  id: string;
  timestamp: string;
  title: string;
  filesTouched: FileTouched[];
  archived: ArchivedFile[];
  related: string[];
  externalState?: string;
}

export interface Entry {
  meta: EntryMeta;
  body: string;
}

export interface StagingMeta {
  id: string;
  timestamp: string;
  title: string;
  filesTouched: FileTouched[];
  related: string[];
  externalState?: string;
  pending: {
    mode: StagingMode;
    archives: PendingArchive[];
  };
}

export interface StagingDraft {
  meta: StagingMeta;
  body: string;
}
