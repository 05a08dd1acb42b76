import { LOG_PREFIX } from "./constants.js";
import { SourceScanUnitLister } from "./listers/source-scan.js";
import { canonicalPath } from "./utils/file-path.js";
import type { ScanFailureError } from "./engine/errors.js";
import type { AbsolutePath, UnitLister } from "./engine/types.js";

export interface OwnershipEngineOptions {
  /** Tree root (the directory holding go.mod). Default: current directory */
  root?: string;
  /** Unit discovery. Default: SourceScanUnitLister */
  lister?: UnitLister;
  /** Count *_test.go files and their imports. Only read by the default lister */
  includeTests?: boolean;
  /** Resolve unknown locations by file basename. Default false (exact paths only) */
  basenameFallback?: boolean;
  /** Called after each full rebuild with the reason */
  onRebuild?: (reason: string) => void;
  /** Called for each unit left out of a scan. Default: console.warn */
  onScanError?: (error: ScanFailureError) => void;
}

export interface ResolvedEngineOptions {
  root: AbsolutePath;
  lister: UnitLister;
  includeTests: boolean;
  basenameFallback: boolean;
  onRebuild: (reason: string) => void;
  onScanError: (error: ScanFailureError) => void;
}

function warnScanError(error: ScanFailureError): void {
  console.warn(`${LOG_PREFIX} Skipping unit ${error.unitId ?? "<unknown>"}:`, error.message);
}

export function resolveEngineOptions(
  options: OwnershipEngineOptions | string = {}
): ResolvedEngineOptions {
  const opts: OwnershipEngineOptions =
    typeof options === "string" ? { root: options } : options;
  const includeTests = opts.includeTests ?? false;
  return {
    root: canonicalPath(opts.root || "."),
    lister: opts.lister ?? new SourceScanUnitLister({ includeTests }),
    includeTests,
    basenameFallback: opts.basenameFallback ?? false,
    onRebuild: opts.onRebuild ?? (() => {}),
    onScanError: opts.onScanError ?? warnScanError,
  };
}
