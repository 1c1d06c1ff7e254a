import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, existsSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { createFileLogStore } from "../src/persist/filesystem.js";
import type { LogStore } from "../src/persist/index.js";
import type { Entry } from "../src/schema.js";

function entry(id: string, title = `entry ${id}`, body = "body"): Entry {
  return {
    meta: { id, timestamp: id.slice(11, 16).replace("-", ":"), title, filesTouched: [], archived: [], related: [] },
    body,
  };
}

describe("file log store", () => {
  let testDir: string;
  let logs: LogStore;

  beforeEach(() => {
    testDir = join(tmpdir(), `scribe-log-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
    logs = createFileLogStore({ rootDir: testDir });
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  describe("append and read", () => {
    test("creates the daily log with its header", () => {
      expect(logs.append(entry("2026-01-23-14-35")).isOk()).toBe(true);

      const text = readFileSync(join(testDir, "2026-01-23.md"), "utf-8");
      expect(text.startsWith("# 2026-01-23\n\n<!-- scribe:entry\n")).toBe(true);
    });

    test("reads entries back in append order", () => {
      logs.append(entry("2026-01-23-09-00", "Morning"))._unsafeUnwrap();
      logs.append(entry("2026-01-23-14-35", "Afternoon"))._unsafeUnwrap();

      const result = logs.read("2026-01-23");
      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.map((e) => e.meta.title)).toEqual(["Morning", "Afternoon"]);
      }
    });

    test("files each entry under the date of its id", () => {
      logs.append(entry("2026-01-23-23-59"))._unsafeUnwrap();
      logs.append(entry("2026-01-24-00-01"))._unsafeUnwrap();

      expect(logs.dates()._unsafeUnwrap()).toEqual(["2026-01-23", "2026-01-24"]);
    });

    test("reading a date without a log gives no entries", () => {
      expect(logs.read("2026-01-01")._unsafeUnwrap()).toEqual([]);
    });

    test("rejects a malformed id", () => {
      const result = logs.append(entry("2026-01-23"));
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error._tag).toBe("id.invalid");
      }
    });

    test("a corrupt log fails to read", () => {
      writeFileSync(join(testDir, "2026-01-23.md"), "# 2026-01-23\n\n<!-- scribe:entry\n{broken\n-->\n## 14:35 — x\n");

      const result = logs.read("2026-01-23");
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error._tag).toBe("log.corrupt");
      }
    });
  });

  describe("find and last", () => {
    beforeEach(() => {
      logs.append(entry("2026-01-22-10-00"))._unsafeUnwrap();
      logs.append(entry("2026-01-23-09-00"))._unsafeUnwrap();
      logs.append(entry("2026-01-23-09-00-02"))._unsafeUnwrap();
    });

    test("find locates an entry through its date", () => {
      expect(logs.find("2026-01-23-09-00-02")._unsafeUnwrap()?.meta.id).toBe("2026-01-23-09-00-02");
      expect(logs.find("2026-01-23-11-11")._unsafeUnwrap()).toBeNull();
      expect(logs.find("not-an-id")._unsafeUnwrap()).toBeNull();
    });

    test("lastEntryId per date and globally", () => {
      expect(logs.lastEntryId("2026-01-22")._unsafeUnwrap()).toBe("2026-01-22-10-00");
      expect(logs.lastEntryId()._unsafeUnwrap()).toBe("2026-01-23-09-00-02");
      expect(logs.lastEntryId("2026-02-01")._unsafeUnwrap()).toBeNull();
    });

    test("last returns the entry with its date", () => {
      const located = logs.last()._unsafeUnwrap();
      expect(located?.date).toBe("2026-01-23");
      expect(located?.entry.meta.id).toBe("2026-01-23-09-00-02");
    });
  });

  describe("replaceLast and deleteLast", () => {
    test("deleteLast restores the bytes from before the append", () => {
      logs.append(entry("2026-01-23-09-00", "Keep", "kept body"))._unsafeUnwrap();
      const before = readFileSync(logs.pathFor("2026-01-23"), "utf-8");

      logs.append(entry("2026-01-23-14-35", "Drop"))._unsafeUnwrap();
      const removed = logs.deleteLast("2026-01-23");

      expect(removed.isOk()).toBe(true);
      if (removed.isOk()) {
        expect(removed.value.meta.title).toBe("Drop");
      }
      expect(readFileSync(logs.pathFor("2026-01-23"), "utf-8")).toBe(before);
    });

    test("deleting the only entry leaves the header", () => {
      logs.append(entry("2026-01-23-09-00"))._unsafeUnwrap();
      logs.deleteLast("2026-01-23")._unsafeUnwrap();

      expect(readFileSync(logs.pathFor("2026-01-23"), "utf-8")).toBe("# 2026-01-23\n");
      expect(logs.read("2026-01-23")._unsafeUnwrap()).toEqual([]);
    });

    test("deleteLast on an empty log fails", () => {
      const result = logs.deleteLast("2026-01-23");
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error._tag).toBe("recovery.nothing-to-delete");
      }
    });

    test("replaceLast leaves earlier records byte-identical", () => {
      logs.append(entry("2026-01-23-09-00", "Keep"))._unsafeUnwrap();
      const prefix = readFileSync(logs.pathFor("2026-01-23"), "utf-8");
      logs.append(entry("2026-01-23-14-35", "Old title"))._unsafeUnwrap();

      const previous = logs.replaceLast("2026-01-23", entry("2026-01-23-14-35", "New title", "new body"));
      expect(previous.isOk()).toBe(true);
      if (previous.isOk()) {
        expect(previous.value.meta.title).toBe("Old title");
      }

      const text = readFileSync(logs.pathFor("2026-01-23"), "utf-8");
      expect(text.startsWith(prefix)).toBe(true);
      expect(logs.read("2026-01-23")._unsafeUnwrap().map((e) => e.meta.title)).toEqual(["Keep", "New title"]);
    });

    test("replaceLast refuses a different id", () => {
      logs.append(entry("2026-01-23-14-35"))._unsafeUnwrap();

      const result = logs.replaceLast("2026-01-23", entry("2026-01-23-14-36"));
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error._tag).toBe("entry.invalid");
      }
    });
  });
});
