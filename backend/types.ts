"use strict";

export type BackendOperand = {
  text: string;
  isImmediate: boolean;
  value: bigint | null;
};

export type BackendInstruction = {
  address: bigint;
  mnemonic: string;
  operands: BackendOperand[];
  isCall: boolean;
  dataRefs: bigint[];
  // Code references other than fallthrough (call and branch targets).
  codeRefs: bigint[];
};

export type BackendBlock = {
  start: bigint;
  end: bigint;
  instructions: BackendInstruction[];
};

export type BackendFunction = {
  start: bigint;
  blocks: BackendBlock[];
};

export type StringRecord = {
  address: bigint;
  text: string;
  referencingAddresses: ReadonlySet<bigint>;
};

/**
 * What the signature engine needs from a disassembly.
 *
 * Queries never throw for unknown addresses or names; they return null and the caller skips
 * the item. `setName` is the only mutation besides `markLibraryFunction`.
 */
export interface AnalysisBackend {
  functionAddresses(): bigint[];
  getFunction(address: bigint): BackendFunction | null;
  functionContaining(address: bigint): bigint | null;
  strings(): StringRecord[];
  nameAt(address: bigint): string | null;
  addressOfName(name: string): bigint | null;
  isFlaggedAddress(value: bigint): boolean;
  setName(address: bigint, name: string): boolean;
  markLibraryFunction(address: bigint): void;
}
