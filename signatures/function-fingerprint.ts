"use strict";

import type { BackendFunction } from "../backend/types.js";
import { fingerprintBlock } from "./block-fingerprint.js";
import type { BlockFingerprintContext } from "./block-fingerprint.js";
import { signatureHash } from "./hash.js";
import type { FunctionSignature } from "./types.js";

export type FunctionFingerprint = {
  signature: FunctionSignature;
  formalHash: number;
  fuzzyHash: number;
};

export const fingerprintFunction = (
  fn: BackendFunction,
  name: string,
  context: BlockFingerprintContext
): FunctionFingerprint => {
  const blocks = fn.blocks.map(block => fingerprintBlock(block, context));
  return {
    signature: { name, blocks },
    formalHash: signatureHash(blocks.map(block => String(block.formalHash)).join("")),
    fuzzyHash: signatureHash(blocks.map(block => String(block.fuzzyHash)).join(""))
  };
};
