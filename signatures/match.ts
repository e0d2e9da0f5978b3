"use strict";

import type { FunctionSignature, SignatureCategoryName, SignatureStore } from "./types.js";

export type MatchedFunction = FunctionSignature & {
  address: bigint;
};

export type FunctionMatch = {
  local: MatchedFunction;
  external: MatchedFunction;
};

export type MatchPass = {
  category: SignatureCategoryName;
  isFuzzy: boolean;
  matches: FunctionMatch[];
  elapsedMs: number;
};

// Most reliable first; the renamer depends on this order.
export const MATCH_ORDER: readonly SignatureCategoryName[] = ["formal", "strings", "immediates", "fuzzy"];

export type MatchOptions = {
  now?: () => number;
};

const describe = (store: SignatureStore, address: bigint): MatchedFunction | null => {
  const signature = store.functions.get(address);
  return signature ? { address, ...signature } : null;
};

const matchCategory = <K>(
  local: SignatureStore,
  localEntries: ReadonlyMap<K, bigint>,
  external: SignatureStore,
  externalEntries: ReadonlyMap<K, bigint>,
  accept: (match: FunctionMatch) => boolean
): FunctionMatch[] => {
  const matches: FunctionMatch[] = [];
  for (const [key, externalAddress] of externalEntries) {
    const localAddress = localEntries.get(key);
    if (localAddress == null) continue;
    const localFunction = describe(local, localAddress);
    const externalFunction = describe(external, externalAddress);
    if (!localFunction || !externalFunction) continue;
    const match = { local: localFunction, external: externalFunction };
    if (accept(match)) matches.push(match);
  }
  return matches;
};

const acceptAll = (): boolean => true;

// Fuzzy hashes collide far more often, so the block counts have to agree as well.
const sameBlockCount = (match: FunctionMatch): boolean => match.local.blocks.length === match.external.blocks.length;

export function matchSignatures(local: SignatureStore, external: SignatureStore, opts: MatchOptions = {}): MatchPass[] {
  const now = opts.now ?? Date.now;
  return MATCH_ORDER.map(category => {
    const startedAt = now();
    const matches =
      category === "immediates"
        ? matchCategory(local, local.immediates, external, external.immediates, acceptAll)
        : matchCategory(
            local,
            local[category],
            external,
            external[category],
            category === "fuzzy" ? sameBlockCount : acceptAll
          );
    return { category, isFuzzy: category === "fuzzy", matches, elapsedMs: now() - startedAt };
  });
}
