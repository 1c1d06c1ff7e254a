/**
 * tagged error union shared by every store.
 * path names the file, asset or entry id involved; message is printable as-is.
 */

export type ScribeError =
  | { _tag: "id.exhausted"; path: string; message: string }
  | { _tag: "id.invalid"; path: string; message: string }
  | { _tag: "staging.busy"; path: string; message: string }
  | { _tag: "staging.empty"; path: string; message: string }
  | { _tag: "staging.parse"; path: string; message: string }
  | { _tag: "staging.placeholder"; path: string; field: "title" | "body"; message: string }
  | { _tag: "assets.source-not-found"; path: string; message: string }
  | { _tag: "assets.destination-exists"; path: string; message: string }
  | { _tag: "assets.io"; path: string; message: string }
  | { _tag: "log.corrupt"; path: string; message: string }
  | { _tag: "log.io"; path: string; message: string }
  | { _tag: "recovery.nothing-to-delete"; path: string; message: string }
  | { _tag: "entry.invalid"; path: string; message: string }
  | { _tag: "commit.failed"; path: string; message: string }
  | { _tag: "finalize.failed"; path: string; message: string };

export type ScribeErrorTag = ScribeError["_tag"];

const TAGS: ReadonlySet<string> = new Set<ScribeErrorTag>([
  "id.exhausted",
  "id.invalid",
  "staging.busy",
  "staging.empty",
  "staging.parse",
  "staging.placeholder",
  "assets.source-not-found",
  "assets.destination-exists",
  "assets.io",
  "log.corrupt",
  "log.io",
  "recovery.nothing-to-delete",
  "entry.invalid",
  "commit.failed",
  "finalize.failed",
]);

export function isScribeError(e: unknown): e is ScribeError {
  if (typeof e !== "object" || e === null) return false;
  if (!("_tag" in e) || !("message" in e) || !("path" in e)) return false;
  return typeof e._tag === "string" && TAGS.has(e._tag) && typeof e.message === "string";
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * pass tagged errors through unchanged, wrap anything else (thrown fs errors,
 * rejected promises) under the given tag.
 */
export function toScribeError(
  e: unknown,
  fallback: { _tag: "assets.io" | "log.io" | "commit.failed" | "finalize.failed"; path: string },
): ScribeError {
  if (isScribeError(e)) return e;
  return { _tag: fallback._tag, path: fallback.path, message: errorMessage(e) };
}
