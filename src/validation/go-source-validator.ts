import * as fs from "node:fs";
import { InvalidInputError } from "../engine/errors.js";
import { lexGo, readGoHeader } from "../listers/go-source.js";
import type { ContentValidator } from "../engine/types.js";

export type SkipReason =
  | "missing"
  | "empty"
  | "comments-only"
  | "no-package-clause"
  | "unbalanced";

/**
 * Reason a Go file is not worth a rescan yet, or null when it is.
 * A file caught mid-write typically has no package clause yet, or an
 * unclosed block, string or comment.
 */
export function goSourceSkipReason(content: string): Exclude<SkipReason, "missing"> | null {
  if (content.trim() === "") return "empty";
  const lex = lexGo(content);
  if (lex.code.trim() === "" && !lex.unterminated) return "comments-only";
  if (lex.unterminated || lex.strayCloser || lex.openBrackets !== 0) return "unbalanced";
  if (readGoHeader(content).packageName === null) return "no-package-clause";
  return null;
}

/**
 * Content validator for Go trees. Files other than *.go always pass.
 */
export class GoSourceValidator implements ContentValidator {
  private lastReason: SkipReason | null = null;

  isProcessable(fileLocation: string): boolean {
    if (!fileLocation || !fileLocation.trim()) {
      throw new InvalidInputError("File location cannot be empty");
    }
    this.lastReason = null;
    if (!fileLocation.endsWith(".go")) return true;

    let content: string;
    try {
      content = fs.readFileSync(fileLocation, "utf-8");
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") {
        this.lastReason = "missing";
        return false;
      }
      throw e;
    }
    this.lastReason = goSourceSkipReason(content);
    return this.lastReason === null;
  }

  /** Why the last `isProcessable` call returned false */
  get skipReason(): SkipReason | null {
    return this.lastReason;
  }
}
