import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, existsSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { err } from "neverthrow";
import { createScribeService, type ScribeService } from "../src/service.js";
import { createRecoveryController } from "../src/recovery.js";
import type { ScribeError } from "../src/errors.js";

describe("recovery controller", () => {
  let testDir: string;
  let service: ScribeService;

  function source(name: string, content = name): string {
    const path = join(testDir, name);
    writeFileSync(path, content);
    return path;
  }

  async function commit(now: Date, title: string, archive: string[] = []) {
    service.staging
      .prepare({ now, archive: archive.map((sourcePath) => ({ sourcePath, description: "snapshot" })) })
      ._unsafeUnwrap();
    service.staging.fill({ title, body: `${title} body` })._unsafeUnwrap();
    return (await service.staging.finalize())._unsafeUnwrap().entry;
  }

  beforeEach(() => {
    testDir = join(tmpdir(), `scribe-recovery-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
    const rootDir = join(testDir, ".scribe");
    service = createScribeService({ rootDir, assetsDir: join(rootDir, "assets") });
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  describe("on an empty store", () => {
    test("showLast returns nothing", () => {
      expect(service.recovery.showLast()._unsafeUnwrap()).toBeNull();
    });

    test("mutations fail with nothing-to-delete", () => {
      expect(service.recovery.deleteLast()._unsafeUnwrapErr()._tag).toBe("recovery.nothing-to-delete");
      expect(service.recovery.replaceLast({ title: "x" })._unsafeUnwrapErr()._tag).toBe("recovery.nothing-to-delete");
      expect(service.recovery.rearchive(source("a.txt"))._unsafeUnwrapErr()._tag).toBe("recovery.nothing-to-delete");
      expect(service.recovery.unarchive()._unsafeUnwrapErr()._tag).toBe("recovery.nothing-to-delete");
    });
  });

  test("showLast returns the globally last entry", async () => {
    await commit(new Date(2026, 0, 22, 10, 0), "Yesterday");
    await commit(new Date(2026, 0, 23, 9, 0), "Today");

    expect(service.recovery.showLast()._unsafeUnwrap()?.meta.title).toBe("Today");
  });

  describe("deleteLast", () => {
    test("removes the entry and its assets, leaving a valid store", async () => {
      await commit(new Date(2026, 0, 23, 9, 0), "Keep", [source("keep.txt")]);
      const before = readFileSync(service.logs.pathFor("2026-01-23"), "utf-8");
      await commit(new Date(2026, 0, 23, 14, 35), "Drop", [source("drop.txt")]);

      const deleted = service.recovery.deleteLast();

      expect(deleted.isOk()).toBe(true);
      if (deleted.isOk()) {
        expect(deleted.value.entry.meta.id).toBe("2026-01-23-14-35");
        expect(deleted.value.assetIds).toEqual(["2026-01-23-14-35-drop.txt"]);
      }
      expect(readFileSync(service.logs.pathFor("2026-01-23"), "utf-8")).toBe(before);
      expect(service.assets.list()._unsafeUnwrap()).toEqual(["2026-01-23-09-00-keep.txt"]);
      expect(service.validator.validate()._unsafeUnwrap().violations).toEqual([]);
    });

    test("does not touch assets of a same-minute sibling", async () => {
      const minute = new Date(2026, 0, 23, 14, 35);
      await commit(minute, "First", [source("data.csv")]);
      await commit(minute, "Second", [source("notes.txt")]);

      service.recovery.deleteLast()._unsafeUnwrap();

      expect(service.assets.list()._unsafeUnwrap()).toEqual(["2026-01-23-14-35-data.csv"]);
    });

    test("walks back one entry per call", async () => {
      await commit(new Date(2026, 0, 22, 10, 0), "Yesterday");
      await commit(new Date(2026, 0, 23, 9, 0), "Today");

      service.recovery.deleteLast()._unsafeUnwrap();
      expect(service.recovery.showLast()._unsafeUnwrap()?.meta.title).toBe("Yesterday");
    });
  });

  describe("replaceLast", () => {
    test("keeps id, timestamp, archive and external state", async () => {
      const original = await commit(new Date(2026, 0, 23, 14, 35), "Draft", [source("a.txt")]);

      const replaced = service.recovery.replaceLast({ title: "Final", body: "Rewritten." });

      expect(replaced.isOk()).toBe(true);
      const stored = service.logs.find(original.meta.id)._unsafeUnwrap();
      expect(stored).toEqual({
        meta: { ...original.meta, title: "Final" },
        body: "Rewritten.",
      });
    });

    test("keeps the indentation of the first body line", async () => {
      await commit(new Date(2026, 0, 23, 14, 35), "Draft");

      const replaced = service.recovery.replaceLast({ body: "\n    indented()\nnext\n\n" });
      expect(replaced._unsafeUnwrap().body).toBe("    indented()\nnext");
      expect(service.recovery.showLast()._unsafeUnwrap()?.body).toBe("    indented()\nnext");
    });

    test("keeps the body when only the title changes", async () => {
      await commit(new Date(2026, 0, 23, 14, 35), "Draft");

      const replaced = service.recovery.replaceLast({ title: "Renamed" });
      expect(replaced._unsafeUnwrap().body).toBe("Draft body");
    });

    test("rejects an empty title", async () => {
      await commit(new Date(2026, 0, 23, 14, 35), "Draft");

      const result = service.recovery.replaceLast({ title: "   " });
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error._tag).toBe("entry.invalid");
      }
      expect(service.recovery.showLast()._unsafeUnwrap()?.meta.title).toBe("Draft");
    });
  });

  describe("rearchive", () => {
    test("replaces the snapshot with a new file", async () => {
      await commit(new Date(2026, 0, 23, 14, 35), "Model", [source("v1.py")]);

      const rearchived = service.recovery.rearchive(source("v2.py"), "second try");

      expect(rearchived.isOk()).toBe(true);
      if (rearchived.isOk()) {
        expect(rearchived.value.meta.archived).toEqual([
          { originalPath: join(testDir, "v2.py"), assetId: "2026-01-23-14-35-v2.py", description: "second try" },
        ]);
      }
      expect(service.assets.list()._unsafeUnwrap()).toEqual(["2026-01-23-14-35-v2.py"]);
      expect(service.validator.validate()._unsafeUnwrap().violations).toEqual([]);
    });

    test("re-snapshots a file of the same name", async () => {
      const path = source("model.py", "old");
      await commit(new Date(2026, 0, 23, 14, 35), "Model", [path]);
      writeFileSync(path, "new");

      const rearchived = service.recovery.rearchive(path);

      expect(rearchived.isOk()).toBe(true);
      if (rearchived.isOk()) {
        expect(rearchived.value.meta.archived[0]?.description).toBe("snapshot");
      }
      expect(readFileSync(join(service.assets.dir, "2026-01-23-14-35-model.py"), "utf-8")).toBe("new");
    });

    test("a failed same-name copy keeps the old snapshot and the entry intact", async () => {
      const path = source("model.py", "old");
      const original = await commit(new Date(2026, 0, 23, 14, 35), "Model", [path]);
      writeFileSync(path, "new");

      const recovery = createRecoveryController(service.logs, {
        ...service.assets,
        replace: (_entryId, sourcePath) => err<string, ScribeError>({ _tag: "assets.io", path: sourcePath, message: "disk full" }),
      });

      const result = recovery.rearchive(path);
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error._tag).toBe("assets.io");
      }
      expect(readFileSync(join(service.assets.dir, "2026-01-23-14-35-model.py"), "utf-8")).toBe("old");
      expect(service.recovery.showLast()._unsafeUnwrap()).toEqual(original);
      expect(service.validator.validate()._unsafeUnwrap().violations).toEqual([]);
    });

    test("a missing source leaves the old snapshot alone", async () => {
      await commit(new Date(2026, 0, 23, 14, 35), "Model", [source("v1.py")]);

      const result = service.recovery.rearchive(join(testDir, "missing.py"));
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error._tag).toBe("assets.source-not-found");
      }
      expect(service.assets.list()._unsafeUnwrap()).toEqual(["2026-01-23-14-35-v1.py"]);
    });
  });

  describe("unarchive", () => {
    test("deletes the assets but keeps the entry text", async () => {
      const entry = await commit(new Date(2026, 0, 23, 14, 35), "Model", [source("v1.py")]);

      const removed = service.recovery.unarchive();

      expect(removed.isOk()).toBe(true);
      if (removed.isOk()) {
        expect(removed.value.assetIds).toEqual(["2026-01-23-14-35-v1.py"]);
      }
      expect(service.assets.list()._unsafeUnwrap()).toEqual([]);
      expect(service.logs.find(entry.meta.id)._unsafeUnwrap()?.meta.archived).toEqual(entry.meta.archived);

      const violations = service.validator.validate()._unsafeUnwrap().violations;
      expect(violations.map((v) => v._tag)).toEqual(["violation.missing-asset"]);
    });
  });
});
