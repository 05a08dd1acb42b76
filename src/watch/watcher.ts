import * as path from "node:path";
import chokidar from "chokidar";
import { WATCH_IGNORE } from "../constants.js";
import { InvalidInputError } from "../engine/errors.js";
import { toPosix, toRelativePaths } from "../utils/file-path.js";
import type { ContentValidator, FileEvent, OwnershipEngine } from "../engine/types.js";

export type WatcherEventName = "add" | "change" | "unlink";

export interface DispatchOptions {
  engine: OwnershipEngine;
  /** Entry handles (root-relative main files) to report on */
  entries: readonly string[];
  /** Consulted before create/write events reach the engine */
  validator?: ContentValidator;
  /** Called with the entries whose build includes the changed file */
  onAffected?: (entries: string[], file: string, event: FileEvent) => void;
  silent?: boolean;
}

export interface DispatchResult {
  /** Root-relative location of the changed file */
  file: string;
  event: FileEvent;
  skipped: boolean;
  affected: string[];
}

export interface WatchEntriesOptions extends DispatchOptions {
  ignored?: (string | RegExp)[];
  /** Use polling instead of native watchers. Default false */
  usePolling?: boolean;
  onError?: (error: unknown) => void;
}

export interface EntryWatcher {
  dispatch: (file: string, event: FileEvent) => DispatchResult;
  close: () => Promise<void>;
}

const WATCHER_EVENTS: Record<WatcherEventName, FileEvent> = {
  add: "create",
  change: "write",
  unlink: "remove",
};

export function toFileEvent(name: WatcherEventName): FileEvent {
  return WATCHER_EVENTS[name];
}

function logDim(silent: boolean | undefined, msg: string): void {
  if (!silent) console.log("\x1b[90m%s\x1b[0m", msg);
}

function logWarn(silent: boolean | undefined, msg: string): void {
  if (!silent) console.log("\x1b[33m%s\x1b[0m", msg);
}

/**
 * Serial event handler: applies each event to the engine once, then asks
 * every entry whether it owns the file.
 */
export function createEventDispatcher(
  options: DispatchOptions
): (file: string, event: FileEvent) => DispatchResult {
  const { engine, entries, validator, onAffected, silent } = options;

  return (file, event) => {
    const abs = path.resolve(engine.root, file);
    const [rel] = toRelativePaths([abs], engine.root);

    if (event !== "remove" && validator && !validator.isProcessable(abs)) {
      logDim(silent, `skipped: ${rel} (not processable yet)`);
      return { file: rel, event, skipped: true, affected: [] };
    }

    engine.applyEvent(abs, event);

    const affected: string[] = [];
    for (const entry of entries) {
      try {
        if (engine.ownedBy(entry, abs)) affected.push(entry);
      } catch (e) {
        if (!(e instanceof InvalidInputError)) throw e;
        logWarn(silent, `entry ${entry}: ${e.message}`);
      }
    }

    if (affected.length > 0) {
      logDim(silent, `${event}: ${rel} → ${affected.join(", ")}`);
      onAffected?.(affected, rel, event);
    } else {
      logDim(silent, `${event}: ${rel} (no entry affected)`);
    }
    return { file: rel, event, skipped: false, affected };
  };
}

export function isIgnoredPath(p: string, patterns: readonly (string | RegExp)[]): boolean {
  const n = toPosix(p);
  for (const pat of patterns) {
    if (typeof pat === "string") {
      const s = pat.replace(/^\*\*\/?|\/\*\*$/g, "");
      if (!s) continue;
      if (n === s || n.startsWith(s + "/") || n.includes("/" + s + "/") || n.endsWith("/" + s)) {
        return true;
      }
    } else if (pat.test(p)) {
      return true;
    }
  }
  return false;
}

/**
 * Watch the engine root and report which entries each change affects.
 * Entries are registered up front so writes to their main files rebuild
 * the graph.
 */
export function watchEntries(options: WatchEntriesOptions): EntryWatcher {
  const { engine, entries, silent } = options;
  const ignoredPatterns = options.ignored ?? WATCH_IGNORE;
  const onError =
    options.onError ??
    ((error: unknown) => {
      console.error("\x1b[33m%s\x1b[0m", "[entrygraph] watcher error:", error);
    });

  for (const entry of entries) {
    if (engine.registerEntry(entry) === undefined) {
      logWarn(silent, `entry ${entry}: no entry point unit matches`);
    }
  }
  const dispatch = createEventDispatcher(options);
  const stats = engine.stats();
  logDim(silent, `watching ${engine.root}: ${stats.units} units, ${stats.entries} entries`);

  const watcher = chokidar.watch(engine.root, {
    persistent: true,
    ignoreInitial: true,
    followSymlinks: false,
    usePolling: options.usePolling ?? false,
    ignored: (p: string) => isIgnoredPath(path.relative(engine.root, p), ignoredPatterns),
  });

  const handle = (name: WatcherEventName) => (file: string) => {
    try {
      dispatch(file, toFileEvent(name));
    } catch (e) {
      onError(e);
    }
  };

  watcher
    .on("add", handle("add"))
    .on("change", handle("change"))
    .on("unlink", handle("unlink"))
    .on("error", onError);

  return {
    dispatch,
    close: () => watcher.close(),
  };
}
