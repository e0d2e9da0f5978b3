"use strict";

import type { FunctionSignature, SignatureStore } from "./types.js";

/**
 * One hash-keyed signature category while a store is being generated.
 *
 * A key seen for a second time is removed and poisoned, so every surviving key identifies
 * exactly one address. The poisoned set never leaves the generator.
 */
export class SignatureCategory<K> {
  readonly active = new Map<K, bigint>();
  readonly poisoned = new Set<K>();

  add(key: K, address: bigint): void {
    if (this.active.has(key)) {
      this.active.delete(key);
      this.poisoned.add(key);
    } else if (!this.poisoned.has(key)) {
      this.active.set(key, address);
    }
  }

  /** Surviving entries in ascending key order. */
  freeze(compare: (a: K, b: K) => number): Map<K, bigint> {
    return new Map([...this.active.entries()].sort(([a], [b]) => compare(a, b)));
  }
}

export const compareNumbers = (a: number, b: number): number => a - b;

export const compareBigints = (a: bigint, b: bigint): number => (a < b ? -1 : a > b ? 1 : 0);

export const createEmptyStore = (): SignatureStore => ({
  formal: new Map(),
  fuzzy: new Map(),
  strings: new Map(),
  immediates: new Map(),
  functions: new Map()
});

export class SignatureStoreBuilder {
  readonly formal = new SignatureCategory<number>();
  readonly fuzzy = new SignatureCategory<number>();
  readonly strings = new SignatureCategory<number>();
  readonly immediates = new SignatureCategory<bigint>();
  private readonly functions = new Map<bigint, FunctionSignature>();

  addFunction(address: bigint, signature: FunctionSignature): void {
    this.functions.set(address, signature);
  }

  build(): SignatureStore {
    return {
      formal: this.formal.freeze(compareNumbers),
      fuzzy: this.fuzzy.freeze(compareNumbers),
      strings: this.strings.freeze(compareNumbers),
      immediates: this.immediates.freeze(compareBigints),
      functions: new Map([...this.functions.entries()].sort(([a], [b]) => compareBigints(a, b)))
    };
  }
}

export type SignatureStoreSummary = {
  formal: number;
  fuzzy: number;
  strings: number;
  immediates: number;
  functions: number;
};

export const summarizeStore = (store: SignatureStore): SignatureStoreSummary => ({
  formal: store.formal.size,
  fuzzy: store.fuzzy.size,
  strings: store.strings.size,
  immediates: store.immediates.size,
  functions: store.functions.size
});
