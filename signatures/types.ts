"use strict";

export type BlockSignature = {
  formalHash: number;
  fuzzyHash: number;
  immediates: bigint[];
  calledNames: string[];
};

export type FunctionSignature = {
  name: string;
  blocks: BlockSignature[];
};

export type SignatureStore = {
  formal: ReadonlyMap<number, bigint>;
  fuzzy: ReadonlyMap<number, bigint>;
  strings: ReadonlyMap<number, bigint>;
  immediates: ReadonlyMap<bigint, bigint>;
  functions: ReadonlyMap<bigint, FunctionSignature>;
};

export type SignatureCategoryName = "formal" | "strings" | "immediates" | "fuzzy";
