/**
 * Evaluation Context & IID Cache
 *
 * Unstructured (iid) components have no coefficient for levels outside the
 * fitted domain. Such positions get a fresh Normal deviate, drawn once per
 * (label, key) and reused for the rest of the current state; the cache is
 * cleared whenever the active state changes.
 *
 * @module core/evaluation-context
 */

import type { Label } from '../types/index.js';
import type { Scope } from '../expression/scope.js';
import type { RandomSource } from '../utils/random.js';

export class IidCache {
  private readonly entries = new Map<Label, Map<string, number>>();

  /**
   * Cached deviate for (label, key), drawing and storing on a miss
   */
  lookup(label: Label, key: string, draw: () => number): number {
    let perLabel = this.entries.get(label);
    if (!perLabel) {
      perLabel = new Map();
      this.entries.set(label, perLabel);
    }
    const cached = perLabel.get(key);
    if (cached !== undefined) return cached;
    const value = draw();
    perLabel.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Number of cached deviates across all labels
   */
  get size(): number {
    let total = 0;
    for (const perLabel of this.entries.values()) total += perLabel.size;
    return total;
  }
}

export class EvaluationContext {
  readonly scope: Scope;
  readonly random: RandomSource;
  readonly iidCache = new IidCache();
  private active = -1;

  constructor(scope: Scope, random: RandomSource) {
    this.scope = scope;
    this.random = random;
  }

  /**
   * Index of the state being evaluated, -1 before the first one
   */
  get stateIndex(): number {
    return this.active;
  }

  /**
   * Enter a state; resets the IID cache when the index changes
   */
  activate(stateIndex: number): void {
    if (stateIndex !== this.active) {
      this.iidCache.clear();
      this.active = stateIndex;
    }
  }
}
