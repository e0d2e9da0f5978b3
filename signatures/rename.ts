"use strict";

import type { AnalysisBackend } from "../backend/types.js";
import type { FunctionMatch, MatchPass } from "./match.js";
import type { BlockSignature, SignatureCategoryName } from "./types.js";

export const PLACEHOLDER_FUNCTION_PREFIX = "sub_";

// First `_`-separated segment of names a disassembler makes up on its own.
export const RESERVED_NAME_PREFIXES: ReadonlySet<string> = new Set(["sub", "loc", "unk", "dword", "word", "byte"]);

export type RenameRecord = {
  address: bigint;
  previousName: string;
  name: string;
  category: SignatureCategoryName;
};

export type RenamePassReport = {
  category: SignatureCategoryName;
  proposals: number;
  renamed: number;
  elapsedMs: number;
};

export type RenameResult = {
  renamed: number;
  passes: RenamePassReport[];
  records: RenameRecord[];
};

export type RenameOptions = {
  now?: () => number;
};

type RenameBackend = Pick<AnalysisBackend, "nameAt" | "addressOfName" | "setName" | "markLibraryFunction">;

export const isPlaceholderName = (name: string): boolean => name.startsWith(PLACEHOLDER_FUNCTION_PREFIX);

export const hasReservedPrefix = (name: string): boolean => RESERVED_NAME_PREFIXES.has(name.split("_")[0] ?? "");

// Fuzzy hashes are deliberately ignored here: at block level they pair up blocks of
// different functions that merely look alike.
export const blocksMatch = (local: BlockSignature, external: BlockSignature): boolean =>
  local.formalHash === external.formalHash &&
  local.immediates.length === external.immediates.length &&
  local.calledNames.length === external.calledNames.length;

/**
 * Pairs up blocks of two matched functions. Only one-to-one pairings are returned: a local
 * block claimed by two external blocks, or an external block that matches two local blocks,
 * is dropped.
 */
export const pairBlocks = (
  localBlocks: readonly BlockSignature[],
  externalBlocks: readonly BlockSignature[]
): Array<[BlockSignature, BlockSignature]> => {
  const claims = new Map<number, number>();
  const poisoned = new Set<number>();
  const externalMatchCounts = new Map<number, number>();
  externalBlocks.forEach((externalBlock, externalIndex) => {
    localBlocks.forEach((localBlock, localIndex) => {
      if (!blocksMatch(localBlock, externalBlock)) return;
      externalMatchCounts.set(externalIndex, (externalMatchCounts.get(externalIndex) ?? 0) + 1);
      if (claims.has(localIndex)) {
        claims.delete(localIndex);
        poisoned.add(localIndex);
      } else if (!poisoned.has(localIndex)) {
        claims.set(localIndex, externalIndex);
      }
    });
  });
  const pairs: Array<[BlockSignature, BlockSignature]> = [];
  for (const [localIndex, externalIndex] of claims) {
    if (externalMatchCounts.get(externalIndex) !== 1) continue;
    const localBlock = localBlocks[localIndex];
    const externalBlock = externalBlocks[externalIndex];
    if (localBlock && externalBlock) pairs.push([localBlock, externalBlock]);
  }
  return pairs;
};

export const mostCommon = <T>(candidates: readonly T[]): T | null => {
  const counts = new Map<T, number>();
  for (const candidate of candidates) counts.set(candidate, (counts.get(candidate) ?? 0) + 1);
  let winner: T | null = null;
  let winnerCount = 0;
  for (const [candidate, count] of counts) {
    if (count > winnerCount) {
      winner = candidate;
      winnerCount = count;
    }
  }
  return winner;
};

class Proposals {
  readonly byName = new Map<string, bigint[]>();

  add(name: string, address: bigint): void {
    if (!name) return;
    const candidates = this.byName.get(name);
    if (candidates) candidates.push(address);
    else this.byName.set(name, [address]);
  }
}

const proposeFromMatch = (backend: RenameBackend, match: FunctionMatch, proposals: Proposals): void => {
  proposals.add(match.external.name, match.local.address);
  for (const [localBlock, externalBlock] of pairBlocks(match.local.blocks, match.external.blocks)) {
    localBlock.calledNames.forEach((calledName, index) => {
      const externalName = externalBlock.calledNames[index];
      const address = backend.addressOfName(calledName);
      if (externalName == null || address == null) return;
      proposals.add(externalName, address);
    });
  }
};

/**
 * Renames `address` to `name` if the current name is a placeholder, the new name is not one
 * and nothing else is called `name` yet. Returns the replaced name on success.
 */
export const tryRename = (backend: RenameBackend, address: bigint, name: string): string | null => {
  const currentName = backend.nameAt(address);
  if (currentName == null || !isPlaceholderName(currentName)) return null;
  if (hasReservedPrefix(name)) return null;
  if (backend.addressOfName(name) != null) return null;
  if (!backend.setName(address, name)) return null;
  backend.markLibraryFunction(address);
  return currentName;
};

export function applyMatches(backend: RenameBackend, passes: readonly MatchPass[], opts: RenameOptions = {}): RenameResult {
  const now = opts.now ?? Date.now;
  const records: RenameRecord[] = [];
  const reports: RenamePassReport[] = [];
  for (const pass of passes) {
    const startedAt = now();
    const proposals = new Proposals();
    for (const match of pass.matches) proposeFromMatch(backend, match, proposals);
    let renamed = 0;
    for (const [name, candidates] of proposals.byName) {
      const winner = mostCommon(candidates);
      if (winner == null) continue;
      const previousName = tryRename(backend, winner, name);
      if (previousName == null) continue;
      renamed += 1;
      records.push({ address: winner, previousName, name, category: pass.category });
    }
    reports.push({ category: pass.category, proposals: proposals.byName.size, renamed, elapsedMs: now() - startedAt });
  }
  return { renamed: records.length, passes: reports, records };
}
