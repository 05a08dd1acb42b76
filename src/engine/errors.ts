import type { UnitId } from "./types.js";

export type EntryGraphErrorCode = "INVALID_INPUT" | "SCAN_FAILURE";

export class EntryGraphError extends Error {
  readonly code: EntryGraphErrorCode;

  constructor(code: EntryGraphErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EntryGraphError";
    this.code = code;
  }
}

/** Empty or malformed identifiers, or an entry handle whose file does not exist */
export class InvalidInputError extends EntryGraphError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

/**
 * Unit discovery failed. Without `unitId` the whole tree scan failed;
 * with it, only that unit was omitted.
 */
export class ScanFailureError extends EntryGraphError {
  readonly unitId: UnitId | undefined;

  constructor(message: string, options?: { cause?: unknown; unitId?: UnitId }) {
    super("SCAN_FAILURE", message, { cause: options?.cause });
    this.name = "ScanFailureError";
    this.unitId = options?.unitId;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
