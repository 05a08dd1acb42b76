import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { join } from "path";
import { SourceScanUnitLister, readModulePath, unitIdFor } from "../../src/listers/source-scan.js";
import { GO_MOD, createGoTree, libFile, mainFile, removeTree } from "../helpers/go-tree.js";

describe("readModulePath", () => {
  let root: string;

  afterAll(() => removeTree(root));

  it("reads a quoted module directive after stripping comments", () => {
    root = createGoTree({ "go.mod": '// generated by hand\nmodule "example.com/q" // main module\n' });
    expect(readModulePath(root)).toBe("example.com/q");
  });
});

describe("unitIdFor", () => {
  it("joins the module path and the relative directory", () => {
    expect(unitIdFor("example.com/proj", "cmd/app")).toBe("example.com/proj/cmd/app");
    expect(unitIdFor("example.com/proj", "")).toBe("example.com/proj");
  });

  it("uses the relative directory without a module", () => {
    expect(unitIdFor("", "db")).toBe("db");
    expect(unitIdFor("", "")).toBe(".");
  });
});

describe("SourceScanUnitLister", () => {
  let root: string;

  beforeAll(() => {
    root = createGoTree({
      "go.mod": GO_MOD,
      "cmd/app/main.go": mainFile(["fmt", "example.com/proj/db"]),
      "db/db.go": libFile("db", ["database/sql"]),
      "db/db_test.go": 'package db_test\n\nimport "testing"\n',
      "vendor/x/x.go": libFile("x"),
      ".hidden/h.go": libFile("h"),
      "testdata/t.go": libFile("t"),
      "broken/a.go": "package a\n",
      "broken/b.go": "package b\n",
      "nopkg/x.go": "// nothing here yet\n",
      "docs/readme.md": "# docs\n",
    });
  });

  afterAll(() => removeTree(root));

  it("lists one unit per source directory, sorted by identifier", () => {
    const units = new SourceScanUnitLister().listUnits(root);
    expect(units.map((u) => u.id)).toEqual([
      "example.com/proj/broken",
      "example.com/proj/cmd/app",
      "example.com/proj/db",
      "example.com/proj/nopkg",
    ]);
  });

  it("reads imports and the entry flag", () => {
    const units = new SourceScanUnitLister().listUnits(root);
    expect(units.find((u) => u.id === "example.com/proj/cmd/app")).toEqual({
      id: "example.com/proj/cmd/app",
      dir: join(root, "cmd/app"),
      sourceFiles: ["main.go"],
      imports: ["example.com/proj/db", "fmt"],
      isEntry: true,
    });
    expect(units.find((u) => u.id === "example.com/proj/db")).toEqual({
      id: "example.com/proj/db",
      dir: join(root, "db"),
      sourceFiles: ["db.go"],
      imports: ["database/sql"],
      isEntry: false,
    });
  });

  it("counts test files when asked", () => {
    const units = new SourceScanUnitLister({ includeTests: true }).listUnits(root);
    const db = units.find((u) => u.id === "example.com/proj/db");
    expect(db?.sourceFiles).toEqual(["db.go", "db_test.go"]);
    expect(db?.imports).toEqual(["database/sql", "testing"]);
    expect(db?.error).toBeUndefined();
  });

  it("reports mixed packages and missing package clauses as unit errors", () => {
    const units = new SourceScanUnitLister().listUnits(root);
    expect(units.find((u) => u.id === "example.com/proj/broken")?.error).toBe(
      "found packages a (a.go), b (b.go) in broken"
    );
    expect(units.find((u) => u.id === "example.com/proj/nopkg")?.error).toBe(
      "nopkg/x.go: expected 'package' clause"
    );
  });

  it("lists a single directory", () => {
    const lister = new SourceScanUnitLister();
    expect(lister.listUnit(root, join(root, "db"))?.id).toBe("example.com/proj/db");
  });

  it("returns null for directories that hold no unit", () => {
    const lister = new SourceScanUnitLister();
    expect(lister.listUnit(root, join(root, "docs"))).toBeNull();
    expect(lister.listUnit(root, join(root, "missing"))).toBeNull();
    expect(lister.listUnit(root, join(root, "vendor/x"))).toBeNull();
    expect(lister.listUnit(root, join(root, ".."))).toBeNull();
  });
});
