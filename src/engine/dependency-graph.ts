/**
 * Dependency Graph
 *
 * Forward edges: A.imports = [B, C] means A depends on B and C.
 * Reverse edges: importers(B) = {A}.
 *
 * Forward closures answer "does entry E's build include unit U" and are
 * memoised per source unit until the next mutation. Reverse closures answer
 * "which units must rebuild when U changes" (changed ∪ transitive importers).
 *
 * Edges may point at identifiers that are not indexed (standard library,
 * units not created yet); they simply lead nowhere.
 */

import type { UnitId } from "./types.js";

export class DependencyGraph {
  private readonly forward = new Map<UnitId, Set<UnitId>>();
  private readonly reverse = new Map<UnitId, Set<UnitId>>();
  private readonly closures = new Map<UnitId, ReadonlySet<UnitId>>();

  /** Replace one unit's outgoing edges */
  setEdges(unit: UnitId, deps: Iterable<UnitId>): void {
    this.dropOutgoing(unit);
    const next = new Set<UnitId>();
    for (const dep of deps) {
      if (dep === unit) continue;
      next.add(dep);
      this.importersSet(dep).add(unit);
    }
    this.forward.set(unit, next);
    this.closures.clear();
  }

  addEdge(from: UnitId, to: UnitId): void {
    if (from === to) return;
    const deps = this.forward.get(from) ?? new Set<UnitId>();
    if (deps.has(to)) return;
    deps.add(to);
    this.forward.set(from, deps);
    this.importersSet(to).add(from);
    this.closures.clear();
  }

  /** Delete a unit's outgoing edges and prune it from every importer's edges */
  removeUnit(unit: UnitId): void {
    this.dropOutgoing(unit);
    this.forward.delete(unit);
    for (const importer of this.reverse.get(unit) ?? []) {
      this.forward.get(importer)?.delete(unit);
    }
    this.reverse.delete(unit);
    this.closures.clear();
  }

  /** True when `from === to` or `to` is transitively imported by `from` */
  reachable(from: UnitId, to: UnitId): boolean {
    if (from === to) return true;
    return this.closureOf(from).has(to);
  }

  /** Every unit transitively imported by `from` (excluding `from` itself) */
  closureOf(from: UnitId): ReadonlySet<UnitId> {
    const cached = this.closures.get(from);
    if (cached) return cached;

    const seen = new Set<UnitId>();
    const stack = [...(this.forward.get(from) ?? [])];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined || id === from || seen.has(id)) continue;
      seen.add(id);
      for (const dep of this.forward.get(id) ?? []) {
        if (!seen.has(dep)) stack.push(dep);
      }
    }
    this.closures.set(from, seen);
    return seen;
  }

  /**
   * `units` ∪ every unit that transitively imports one of them.
   * BFS up the reverse edges.
   */
  importersClosure(units: Iterable<UnitId>): Set<UnitId> {
    const invalidated = new Set<UnitId>(units);
    const queue = [...invalidated];

    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined) break;
      for (const importer of this.reverse.get(id) ?? []) {
        if (!invalidated.has(importer)) {
          invalidated.add(importer);
          queue.push(importer);
        }
      }
    }
    return invalidated;
  }

  dependenciesOf(unit: UnitId): UnitId[] {
    return [...(this.forward.get(unit) ?? [])];
  }

  importersOf(unit: UnitId): UnitId[] {
    return [...(this.reverse.get(unit) ?? [])];
  }

  get edgeCount(): number {
    let n = 0;
    for (const deps of this.forward.values()) n += deps.size;
    return n;
  }

  clear(): void {
    this.forward.clear();
    this.reverse.clear();
    this.closures.clear();
  }

  private dropOutgoing(unit: UnitId): void {
    for (const dep of this.forward.get(unit) ?? []) {
      const importers = this.reverse.get(dep);
      importers?.delete(unit);
      if (importers && importers.size === 0) this.reverse.delete(dep);
    }
  }

  private importersSet(unit: UnitId): Set<UnitId> {
    const importers = this.reverse.get(unit) ?? new Set<UnitId>();
    this.reverse.set(unit, importers);
    return importers;
  }
}
