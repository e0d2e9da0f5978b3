"use strict";

import type { AnalysisBackend, StringRecord } from "../backend/types.js";
import { fingerprintFunction } from "./function-fingerprint.js";
import { signatureHash } from "./hash.js";
import { SignatureStoreBuilder, summarizeStore } from "./store.js";
import type { SignatureStoreSummary } from "./store.js";
import type { SignatureStore } from "./types.js";

export const MIN_SIGNATURE_STRING_LENGTH = 8;

export type GenerateOptions = {
  minStringLength?: number;
  now?: () => number;
};

export type GenerateReport = SignatureStoreSummary & {
  skippedStrings: number;
  skippedFunctions: number;
  elapsedMs: number;
};

export type GenerateResult = {
  store: SignatureStore;
  report: GenerateReport;
};

const addStringSignatures = (
  backend: AnalysisBackend,
  strings: StringRecord[],
  builder: SignatureStoreBuilder,
  minLength: number
): number => {
  let skipped = 0;
  for (const record of strings) {
    if (record.text.length < minLength || record.referencingAddresses.size !== 1) continue;
    const [reference] = record.referencingAddresses;
    const owner = reference == null ? null : backend.functionContaining(reference);
    if (owner == null) {
      skipped += 1;
      continue;
    }
    builder.strings.add(signatureHash(record.text), owner);
  }
  return skipped;
};

const addFunctionSignatures = (
  backend: AnalysisBackend,
  stringsByAddress: ReadonlyMap<bigint, StringRecord>,
  builder: SignatureStoreBuilder
): number => {
  let skipped = 0;
  const context = { backend, stringsByAddress };
  for (const address of backend.functionAddresses()) {
    const fn = backend.getFunction(address);
    if (!fn) {
      skipped += 1;
      continue;
    }
    const { signature, formalHash, fuzzyHash } = fingerprintFunction(fn, backend.nameAt(fn.start) ?? "", context);
    builder.addFunction(fn.start, signature);
    builder.formal.add(formalHash, fn.start);
    builder.fuzzy.add(fuzzyHash, fn.start);
    for (const block of signature.blocks) {
      for (const immediate of block.immediates) builder.immediates.add(immediate, fn.start);
    }
  }
  return skipped;
};

/**
 * Fingerprints every string and function the backend knows about. Signatures that occur
 * more than once in the binary are dropped from their category entirely.
 */
export function generateSignatures(backend: AnalysisBackend, opts: GenerateOptions = {}): GenerateResult {
  const now = opts.now ?? Date.now;
  const startedAt = now();
  const strings = backend.strings();
  const stringsByAddress = new Map(strings.map(record => [record.address, record]));
  const builder = new SignatureStoreBuilder();

  const skippedStrings = addStringSignatures(
    backend,
    strings,
    builder,
    opts.minStringLength ?? MIN_SIGNATURE_STRING_LENGTH
  );
  const skippedFunctions = addFunctionSignatures(backend, stringsByAddress, builder);

  const store = builder.build();
  return {
    store,
    report: {
      ...summarizeStore(store),
      skippedStrings,
      skippedFunctions,
      elapsedMs: now() - startedAt
    }
  };
}
