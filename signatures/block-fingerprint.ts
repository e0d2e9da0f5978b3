"use strict";

import type { AnalysisBackend, BackendBlock, BackendInstruction, StringRecord } from "../backend/types.js";
import { signatureHash } from "./hash.js";
import type { BlockSignature } from "./types.js";

// Immediates below this are too common (sizes, masks, small constants) to identify anything.
export const MIN_INTERESTING_IMMEDIATE = 0xffffn;

const FUNCTION_REFERENCE_TOKEN = "funcref";
const DATA_REFERENCE_TOKEN = "dataref";

export type BlockFingerprintContext = {
  backend: Pick<AnalysisBackend, "nameAt" | "isFlaggedAddress">;
  stringsByAddress: ReadonlyMap<bigint, StringRecord>;
};

type BlockTokens = {
  formal: string[];
  fuzzy: string[];
  immediates: bigint[];
  calledNames: string[];
};

const addCallTokens = (instruction: BackendInstruction, context: BlockFingerprintContext, tokens: BlockTokens): void => {
  for (const target of instruction.codeRefs) {
    const name = context.backend.nameAt(target);
    if (!name) continue;
    tokens.calledNames.push(name);
    tokens.fuzzy.push(FUNCTION_REFERENCE_TOKEN);
  }
};

const addDataTokens = (instruction: BackendInstruction, context: BlockFingerprintContext, tokens: BlockTokens): void => {
  for (const target of instruction.dataRefs) {
    const token = context.stringsByAddress.get(target)?.text ?? DATA_REFERENCE_TOKEN;
    tokens.formal.push(token);
    tokens.fuzzy.push(token);
  }
};

const addOperandTokens = (instruction: BackendInstruction, context: BlockFingerprintContext, tokens: BlockTokens): void => {
  for (const operand of instruction.operands) {
    tokens.formal.push(operand.text);
    if (!operand.isImmediate || operand.value == null || operand.text.startsWith("-")) continue;
    if (operand.value < MIN_INTERESTING_IMMEDIATE) continue;
    if (context.backend.isFlaggedAddress(operand.value)) continue;
    tokens.fuzzy.push(operand.value.toString(10));
    tokens.immediates.push(operand.value);
  }
};

export const fingerprintBlock = (block: BackendBlock, context: BlockFingerprintContext): BlockSignature => {
  const tokens: BlockTokens = { formal: [], fuzzy: [], immediates: [], calledNames: [] };
  const instructions = [...block.instructions].sort((a, b) => (a.address < b.address ? -1 : a.address > b.address ? 1 : 0));
  for (const instruction of instructions) {
    tokens.formal.push(instruction.mnemonic);
    if (instruction.isCall) {
      addCallTokens(instruction, context, tokens);
    } else if (instruction.dataRefs.length > 0) {
      addDataTokens(instruction, context, tokens);
    } else if (instruction.codeRefs.length === 0) {
      addOperandTokens(instruction, context, tokens);
    }
  }
  return {
    formalHash: signatureHash(tokens.formal.join("")),
    fuzzyHash: signatureHash(tokens.fuzzy.join("")),
    immediates: tokens.immediates,
    calledNames: tokens.calledNames
  };
};
