/**
 * Go source header reading: package clause and import paths.
 *
 * Only the file header is read. Build constraints (//go:build, GOOS/GOARCH
 * file suffixes) are not evaluated; GoListUnitLister applies them.
 */

export interface GoFileHeader {
  /** Package clause name, or null when the file has none */
  packageName: string | null;
  /** Import paths in declaration order */
  imports: string[];
}

export interface GoLexResult {
  /** Source with comments blanked out (newlines kept) */
  code: string;
  /** Net count of unclosed (, [ and { outside strings and comments */
  openBrackets: number;
  /** A closing bracket appeared with no matching opener */
  strayCloser: boolean;
  /** A string, rune or block comment runs to end of file */
  unterminated: boolean;
}

const OPENERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };
const CLOSERS = new Set([")", "]", "}"]);

export function lexGo(src: string): GoLexResult {
  let code = "";
  const stack: string[] = [];
  let strayCloser = false;
  let i = 0;

  while (i < src.length) {
    const c = src[i];
    const next = src[i + 1];

    if (c === "/" && next === "/") {
      const end = src.indexOf("\n", i);
      const stop = end === -1 ? src.length : end;
      code += " ".repeat(stop - i);
      i = stop;
      continue;
    }
    if (c === "/" && next === "*") {
      const end = src.indexOf("*/", i + 2);
      if (end === -1) {
        return { code, openBrackets: stack.length, strayCloser, unterminated: true };
      }
      code += src.slice(i, end + 2).replace(/[^\n]/g, " ");
      i = end + 2;
      continue;
    }
    if (c === '"' || c === "'" || c === "`") {
      const end = findStringEnd(src, i);
      if (end === -1) {
        return { code, openBrackets: stack.length, strayCloser, unterminated: true };
      }
      code += src.slice(i, end + 1);
      i = end + 1;
      continue;
    }

    if (c in OPENERS) {
      stack.push(OPENERS[c]);
    } else if (CLOSERS.has(c)) {
      if (stack.pop() !== c) strayCloser = true;
    }
    code += c;
    i++;
  }

  return { code, openBrackets: stack.length, strayCloser, unterminated: false };
}

/** Index of the closing quote of the literal opening at `start`, or -1 */
function findStringEnd(src: string, start: number): number {
  const quote = src[start];
  let i = start + 1;
  while (i < src.length) {
    const c = src[i];
    if (quote !== "`" && c === "\\") {
      i += 2;
      continue;
    }
    if (quote !== "`" && c === "\n") return -1;
    if (c === quote) return i;
    i++;
  }
  return -1;
}

const PACKAGE_CLAUSE = /^\s*package\s+([A-Za-z_][A-Za-z0-9_]*)/;
const FIRST_DECL = /^[ \t]*(?:func|type|var|const)\b/m;
const IMPORT_GROUP = /\bimport\s*\(([^)]*)\)/g;
const IMPORT_SINGLE = /\bimport\s+(?:[A-Za-z_][A-Za-z0-9_]*\s+|\.\s*|_\s+)?(["`])([^"`]+)\1/g;
const IMPORT_SPEC = /(?:[A-Za-z_][A-Za-z0-9_]*|\.)?\s*(["`])([^"`]+)\1/g;

export function readGoHeader(src: string): GoFileHeader {
  const { code } = lexGo(src);
  const pkg = PACKAGE_CLAUSE.exec(code);
  if (!pkg) return { packageName: null, imports: [] };

  const afterClause = code.slice(pkg.index + pkg[0].length);
  const declAt = afterClause.search(FIRST_DECL);
  const header = declAt === -1 ? afterClause : afterClause.slice(0, declAt);

  const found: Array<{ at: number; path: string }> = [];
  IMPORT_GROUP.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = IMPORT_GROUP.exec(header)) !== null) {
    const body = m[1];
    IMPORT_SPEC.lastIndex = 0;
    let spec: RegExpExecArray | null;
    while ((spec = IMPORT_SPEC.exec(body)) !== null) {
      found.push({ at: m.index + spec.index, path: spec[2] });
    }
  }
  IMPORT_SINGLE.lastIndex = 0;
  while ((m = IMPORT_SINGLE.exec(header)) !== null) {
    found.push({ at: m.index, path: m[2] });
  }

  const imports: string[] = [];
  for (const { path } of found.sort((a, b) => a.at - b.at)) {
    if (!imports.includes(path)) imports.push(path);
  }
  return { packageName: pkg[1], imports };
}
