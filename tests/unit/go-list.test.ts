import { describe, it, expect } from "vitest";
import {
  GoListUnitLister,
  parseGoListOutput,
  splitJsonStream,
  type GoCommandRunner,
} from "../../src/listers/go-list.js";
import { ScanFailureError } from "../../src/engine/errors.js";

const OUTPUT = `{
	"Dir": "/w/cmd/app",
	"ImportPath": "example.com/proj/cmd/app",
	"Name": "main",
	"GoFiles": ["main.go"],
	"Imports": ["example.com/proj/db", "fmt"]
}
{
	"Dir": "/w/db",
	"ImportPath": "example.com/proj/db",
	"Name": "db",
	"GoFiles": ["db.go"],
	"TestGoFiles": ["db_test.go"],
	"Imports": ["database/sql"],
	"TestImports": ["testing"]
}
{
	"Dir": "/usr/lib/go/src/fmt",
	"ImportPath": "fmt",
	"Name": "fmt",
	"Standard": true,
	"GoFiles": ["print.go"]
}
{
	"Dir": "/w/docs",
	"ImportPath": "example.com/proj/docs",
	"Error": { "Err": "no Go files in /w/docs" }
}
{
	"Dir": "/w/bad",
	"ImportPath": "example.com/proj/bad",
	"Name": "bad",
	"GoFiles": ["bad.go"],
	"Error": { "Err": "bad/bad.go:3:1: expected declaration, found '}'" }
}
`;

function recordingRunner(output: string): { run: GoCommandRunner; calls: Array<[string[], string]> } {
  const calls: Array<[string[], string]> = [];
  return {
    calls,
    run: (args, cwd) => {
      calls.push([args, cwd]);
      return output;
    },
  };
}

describe("splitJsonStream", () => {
  it("splits concatenated objects and ignores braces inside strings", () => {
    expect(splitJsonStream('{"a":1}\n{"b":"} {"}')).toEqual(['{"a":1}', '{"b":"} {"}']);
  });

  it("rejects truncated output", () => {
    expect(() => splitJsonStream('{"a":1}\n{"b":')).toThrow("Truncated go list output");
  });
});

describe("parseGoListOutput", () => {
  it("fills absent lists with empty arrays", () => {
    const [pkg] = parseGoListOutput('{"ImportPath":"example.com/proj/x","Name":"x"}');
    expect(pkg.GoFiles).toEqual([]);
    expect(pkg.Imports).toEqual([]);
    expect(pkg.Dir).toBe("");
  });

  it("rejects malformed JSON", () => {
    expect(() => parseGoListOutput("{oops}")).toThrow(ScanFailureError);
  });

  it("rejects packages without import path", () => {
    expect(() => parseGoListOutput('{"Dir":"/w"}')).toThrow(/^Unexpected go list package shape/);
  });
});

describe("GoListUnitLister", () => {
  it("lists the module's units and skips the standard library", () => {
    const { run, calls } = recordingRunner(OUTPUT);
    const units = new GoListUnitLister({ run }).listUnits("/w");

    expect(calls).toEqual([[["list", "-e", "-json", "./..."], "/w"]]);
    expect(units.map((u) => u.id)).toEqual([
      "example.com/proj/cmd/app",
      "example.com/proj/db",
      "example.com/proj/bad",
    ]);
    expect(units[0]).toEqual({
      id: "example.com/proj/cmd/app",
      dir: "/w/cmd/app",
      sourceFiles: ["main.go"],
      imports: ["example.com/proj/db", "fmt"],
      isEntry: true,
    });
  });

  it("keeps package errors other than missing sources", () => {
    const { run } = recordingRunner(OUTPUT);
    const bad = new GoListUnitLister({ run }).listUnits("/w").find((u) => u.id === "example.com/proj/bad");
    expect(bad?.error).toBe("bad/bad.go:3:1: expected declaration, found '}'");
  });

  it("adds test files and imports when asked", () => {
    const { run } = recordingRunner(OUTPUT);
    const db = new GoListUnitLister({ run, includeTests: true })
      .listUnits("/w")
      .find((u) => u.id === "example.com/proj/db");
    expect(db?.sourceFiles).toEqual(["db.go", "db_test.go"]);
    expect(db?.imports).toEqual(["database/sql", "testing"]);
  });

  it("lists a single directory relative to the root", () => {
    const { run, calls } = recordingRunner(
      '{"Dir":"/w/db","ImportPath":"example.com/proj/db","Name":"db","GoFiles":["db.go"]}'
    );
    const lister = new GoListUnitLister({ run });
    expect(lister.listUnit("/w", "/w/db")?.id).toBe("example.com/proj/db");
    lister.listUnit("/w", "/w");
    expect(calls.map(([args]) => args[3])).toEqual(["./db", "."]);
  });

  it("returns null for a directory without sources", () => {
    const { run } = recordingRunner(
      '{"Dir":"/w/docs","ImportPath":"example.com/proj/docs","Error":{"Err":"no Go files in /w/docs"}}'
    );
    expect(new GoListUnitLister({ run }).listUnit("/w", "/w/docs")).toBeNull();
  });

  it("wraps a failing command in ScanFailureError", () => {
    const run: GoCommandRunner = () => {
      throw new Error("exit status 1");
    };
    expect(() => new GoListUnitLister({ run }).listUnits("/w")).toThrow(
      "go list ./... failed: exit status 1"
    );
  });
});
