import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { rmSync } from "fs";
import { join } from "path";
import { createEventDispatcher, isIgnoredPath, toFileEvent, watchEntries } from "../../src/watch/watcher.js";
import { createOwnershipEngine } from "../../src/engine/impl.js";
import { GoSourceValidator } from "../../src/validation/go-source-validator.js";
import { WATCH_IGNORE } from "../../src/constants.js";
import type { FileEvent, OwnershipEngine } from "../../src/engine/types.js";
import { GO_MOD, createGoTree, libFile, mainFile, removeTree, writeTreeFiles } from "../helpers/go-tree.js";

describe("toFileEvent", () => {
  it("maps watcher events to file events", () => {
    expect(toFileEvent("add")).toBe("create");
    expect(toFileEvent("change")).toBe("write");
    expect(toFileEvent("unlink")).toBe("remove");
  });
});

describe("isIgnoredPath", () => {
  it("ignores vendored, installed and hidden locations", () => {
    expect(isIgnoredPath("vendor/x/x.go", WATCH_IGNORE)).toBe(true);
    expect(isIgnoredPath("web/node_modules/pkg/index.js", WATCH_IGNORE)).toBe(true);
    expect(isIgnoredPath(".git/HEAD", WATCH_IGNORE)).toBe(true);
    expect(isIgnoredPath("cmd/.cache/x", WATCH_IGNORE)).toBe(true);
  });

  it("keeps ordinary sources", () => {
    expect(isIgnoredPath("cmd/app/main.go", WATCH_IGNORE)).toBe(false);
    expect(isIgnoredPath("vendorized/x.go", WATCH_IGNORE)).toBe(false);
    expect(isIgnoredPath("", WATCH_IGNORE)).toBe(false);
  });
});

describe("createEventDispatcher", () => {
  let root: string;
  let engine: OwnershipEngine;

  beforeEach(() => {
    root = createGoTree({
      "go.mod": GO_MOD,
      "app/main.go": mainFile(["example.com/proj/db"]),
      "tool/main.go": mainFile(),
      "db/db.go": libFile("db"),
    });
    engine = createOwnershipEngine({ root, onScanError: () => {} });
  });

  afterEach(() => removeTree(root));

  it("reports the entries whose build includes the changed file", () => {
    const onAffected = vi.fn<(entries: string[], file: string, event: FileEvent) => void>();
    const dispatch = createEventDispatcher({
      engine,
      entries: ["app/main.go", "tool/main.go"],
      onAffected,
      silent: true,
    });

    expect(dispatch("db/db.go", "write")).toEqual({
      file: "db/db.go",
      event: "write",
      skipped: false,
      affected: ["app/main.go"],
    });
    expect(onAffected).toHaveBeenCalledWith(["app/main.go"], "db/db.go", "write");
  });

  it("reports absolute locations relative to the root", () => {
    const dispatch = createEventDispatcher({ engine, entries: ["tool/main.go"], silent: true });
    expect(dispatch(join(root, "tool/main.go"), "write")).toEqual({
      file: "tool/main.go",
      event: "write",
      skipped: false,
      affected: ["tool/main.go"],
    });
  });

  it("skips files the validator rejects without touching the engine", () => {
    writeTreeFiles(root, { "db/db.go": "pack" });
    const dispatch = createEventDispatcher({
      engine,
      entries: ["app/main.go"],
      validator: new GoSourceValidator(),
      silent: true,
    });

    expect(dispatch("db/db.go", "write")).toEqual({
      file: "db/db.go",
      event: "write",
      skipped: true,
      affected: [],
    });
    expect(engine.state).toBe("uninitialized");
  });

  it("indexes a file whose create was skipped once it is written", () => {
    engine.ownedBy("app/main.go", "db/db.go");
    const dispatch = createEventDispatcher({
      engine,
      entries: ["app/main.go", "tool/main.go"],
      validator: new GoSourceValidator(),
      silent: true,
    });

    writeTreeFiles(root, { "db/extra.go": "" });
    expect(dispatch("db/extra.go", "create").skipped).toBe(true);

    writeTreeFiles(root, { "db/extra.go": libFile("db") });
    expect(dispatch("db/extra.go", "write")).toEqual({
      file: "db/extra.go",
      event: "write",
      skipped: false,
      affected: ["app/main.go"],
    });
    expect(engine.ownedBy("app/main.go", "db/extra.go")).toBe(true);
  });

  it("passes removals through without validation", () => {
    engine.ownedBy("app/main.go", "db/db.go");
    rmSync(join(root, "db/db.go"));
    const dispatch = createEventDispatcher({
      engine,
      entries: ["app/main.go"],
      validator: new GoSourceValidator(),
      silent: true,
    });

    expect(dispatch("db/db.go", "remove")).toEqual({
      file: "db/db.go",
      event: "remove",
      skipped: false,
      affected: [],
    });
  });

  it("keeps going past an entry that does not exist", () => {
    const dispatch = createEventDispatcher({
      engine,
      entries: ["missing/main.go", "app/main.go"],
      silent: true,
    });
    expect(dispatch("db/db.go", "write").affected).toEqual(["app/main.go"]);
  });
});

describe("watchEntries", () => {
  let root: string;

  beforeEach(() => {
    root = createGoTree({ "go.mod": GO_MOD, "app/main.go": mainFile() });
  });

  afterEach(() => removeTree(root));

  it("scans and registers the entries before watching", async () => {
    const engine = createOwnershipEngine({ root, onScanError: () => {} });
    const watcher = watchEntries({ engine, entries: ["app/main.go"], silent: true });
    try {
      expect(engine.state).toBe("ready");
      expect(engine.stats().entries).toBe(1);
      expect(watcher.dispatch("app/main.go", "write").affected).toEqual(["app/main.go"]);
    } finally {
      await watcher.close();
    }
  });
});
