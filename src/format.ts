/**
 * record serialization for daily logs and the staging slot.
 * markdown records with JSON metadata in an HTML comment header:
 *
 *   <!-- scribe:entry
 *   { "id": "2026-01-23-14-35", ... }
 *   -->
 *   ## 14:35 — title
 *
 *   body
 */

import { ok, err, type Result } from "neverthrow";
import { type } from "arktype";
import {
  EntryHeaderSchema,
  StagingHeaderSchema,
  type Entry,
  type EntryHeader,
  type StagingDraft,
  type StagingHeader,
} from "./schema.js";
import type { ScribeError } from "./errors.js";

export const ENTRY_MARKER = "<!-- scribe:entry";
export const STAGING_MARKER = "<!-- scribe:staging";
const HEADER_END = "-->";

export const TITLE_PLACEHOLDER = "__TITLE__";
export const BODY_PLACEHOLDER = "__BODY__";

const HEADING_PATTERN = /^## (\S+) —(?: (.*))?$/;
const ENTRY_MARKER_PATTERN = /^<!-- scribe:entry$/gm;

interface RawRecord {
  header: unknown;
  title: string;
  body: string;
}

function normalizeTitle(title: string): string {
  return title.replace(/\s*\n\s*/g, " ").trim();
}

/** drops leading blank lines and trailing whitespace; indentation of the first line survives. */
export function normalizeBody(body: string): string {
  return body.replace(/^\n+/, "").trimEnd();
}

// body lines that look like record markers gain one leading backslash
function escapeBody(body: string): string {
  return body.replace(/^(\\*<!-- scribe:)/gm, "\\$1");
}

function unescapeBody(body: string): string {
  return body.replace(/^\\(\\*<!-- scribe:)/gm, "$1");
}

function serializeRecord(marker: string, header: object, timestamp: string, title: string, body: string): string {
  const json = JSON.stringify(header, null, 2).replaceAll("-->", "--\\u003E");
  const heading = `## ${timestamp} — ${normalizeTitle(title)}`;
  const text = escapeBody(normalizeBody(body));
  const head = `${marker}\n${json}\n${HEADER_END}\n${heading}\n`;
  return text ? `${head}\n${text}\n` : head;
}

function parseRecord(text: string, marker: string): Result<RawRecord, string> {
  const startIdx = text.indexOf(marker);
  if (startIdx === -1) {
    return err("missing metadata header");
  }

  const jsonStart = startIdx + marker.length;
  const endIdx = text.indexOf(HEADER_END, jsonStart);
  if (endIdx === -1) {
    return err("unterminated metadata header");
  }

  let header: unknown;
  try {
    // "--\u003E" decodes back to "-->" inside JSON strings
    header = JSON.parse(text.slice(jsonStart, endIdx).trim());
  } catch (e) {
    return err(`invalid JSON in metadata header: ${e instanceof Error ? e.message : String(e)}`);
  }

  const rest = text.slice(endIdx + HEADER_END.length).replace(/^\n/, "");
  const headingEnd = rest.indexOf("\n");
  const headingLine = headingEnd === -1 ? rest : rest.slice(0, headingEnd);
  const match = headingLine.match(HEADING_PATTERN);
  if (!match) {
    return err("missing '## HH:MM — title' heading");
  }

  return ok({
    header,
    title: (match[2] ?? "").trim(),
    body: headingEnd === -1 ? "" : unescapeBody(normalizeBody(rest.slice(headingEnd + 1))),
  });
}

export function dailyLogHeader(date: string): string {
  return `# ${date}\n`;
}

export function serializeEntry(entry: Entry): string {
  const { meta } = entry;
  const header: EntryHeader = {
    id: meta.id,
    timestamp: meta.timestamp,
    filesTouched: meta.filesTouched,
    archived: meta.archived,
    related: meta.related,
    ...(meta.externalState !== undefined ? { externalState: meta.externalState } : {}),
  };
  return serializeRecord(ENTRY_MARKER, header, meta.timestamp, meta.title, entry.body);
}

/** byte offsets at which each entry record of a daily log starts. */
export function recordOffsets(text: string): number[] {
  return [...text.matchAll(ENTRY_MARKER_PATTERN)].map((m) => m.index ?? 0);
}

export function parseEntryRecord(text: string, sourcePath: string): Result<Entry, ScribeError> {
  const raw = parseRecord(text, ENTRY_MARKER);
  if (raw.isErr()) {
    return err({ _tag: "log.corrupt", path: sourcePath, message: `${sourcePath}: ${raw.error}` });
  }

  const header = EntryHeaderSchema(raw.value.header);
  if (header instanceof type.errors) {
    return err({
      _tag: "log.corrupt",
      path: sourcePath,
      message: `${sourcePath}: schema validation failed: ${header.summary}`,
    });
  }

  if (!header.id) {
    return err({ _tag: "log.corrupt", path: sourcePath, message: `${sourcePath}: record is missing its id` });
  }
  if (!raw.value.title) {
    return err({
      _tag: "log.corrupt",
      path: sourcePath,
      message: `${sourcePath}: record ${header.id} is missing its title`,
    });
  }

  return ok({
    meta: { ...header, title: raw.value.title },
    body: raw.value.body,
  });
}

export function parseDailyLog(text: string, sourcePath: string): Result<Entry[], ScribeError> {
  const offsets = recordOffsets(text);
  const entries: Entry[] = [];

  for (const [i, start] of offsets.entries()) {
    const end = offsets[i + 1] ?? text.length;
    const parsed = parseEntryRecord(text.slice(start, end), sourcePath);
    if (parsed.isErr()) return err(parsed.error);
    entries.push(parsed.value);
  }

  return ok(entries);
}

export function serializeStaging(draft: StagingDraft): string {
  const { meta } = draft;
  const header: StagingHeader = {
    id: meta.id,
    timestamp: meta.timestamp,
    filesTouched: meta.filesTouched,
    related: meta.related,
    ...(meta.externalState !== undefined ? { externalState: meta.externalState } : {}),
    pending: meta.pending,
  };
  return serializeRecord(STAGING_MARKER, header, meta.timestamp, meta.title, draft.body);
}

export function parseStaging(text: string, sourcePath: string): Result<StagingDraft, ScribeError> {
  const raw = parseRecord(text, STAGING_MARKER);
  if (raw.isErr()) {
    return err({ _tag: "staging.parse", path: sourcePath, message: `${sourcePath}: ${raw.error}` });
  }

  const header = StagingHeaderSchema(raw.value.header);
  if (header instanceof type.errors) {
    return err({
      _tag: "staging.parse",
      path: sourcePath,
      message: `${sourcePath}: schema validation failed: ${header.summary}`,
    });
  }

  return ok({
    meta: { ...header, title: raw.value.title },
    body: raw.value.body,
  });
}

/** first field still holding its placeholder (or an empty title), if any. */
export function unresolvedPlaceholder(draft: StagingDraft): "title" | "body" | null {
  const title = draft.meta.title.trim();
  if (!title || title.includes(TITLE_PLACEHOLDER)) return "title";
  if (draft.body.includes(BODY_PLACEHOLDER)) return "body";
  return null;
}
