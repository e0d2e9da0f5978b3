"use strict";

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const encoder = new TextEncoder();

/** 32-bit FNV-1a over the UTF-8 encoding of `text`. */
export const fnv1a32 = (text: string): number => {
  let hash = FNV_OFFSET_BASIS;
  for (const byteValue of encoder.encode(text)) {
    hash ^= byteValue;
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
};

export const signatureHash = (value: string | number | bigint): number => fnv1a32(String(value));
