"use strict";

import { readFile, writeFile } from "node:fs/promises";
import { basename } from "node:path";
import { compareBigints, compareNumbers } from "./store.js";
import type { BlockSignature, FunctionSignature, SignatureStore } from "./types.js";

export const SIGNATURE_FILE_EXTENSION = ".sig";
export const DEFAULT_SIGNATURE_FILE = `blocksig${SIGNATURE_FILE_EXTENSION}`;
export const SIGNATURE_FILE_MAGIC = "BSIG";
export const SIGNATURE_FILE_VERSION = 1;

/** Appends the signature file extension to a path whose file name has none. */
export const withSignatureExtension = (path: string): string =>
  basename(path).includes(".") ? path : `${path}${SIGNATURE_FILE_EXTENSION}`;

export class SignatureFileError extends Error {
  readonly path: string | null;

  constructor(message: string, path: string | null = null, options?: { cause?: unknown }) {
    super(path ? `${message} (${path})` : message, options);
    this.name = "SignatureFileError";
    this.path = path;
  }
}

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

class ByteWriter {
  private readonly chunks: Uint8Array[] = [];
  private length = 0;

  private push(chunk: Uint8Array): void {
    this.chunks.push(chunk);
    this.length += chunk.length;
  }

  u16(value: number): void {
    const chunk = new Uint8Array(2);
    new DataView(chunk.buffer).setUint16(0, value, true);
    this.push(chunk);
  }

  u32(value: number): void {
    const chunk = new Uint8Array(4);
    new DataView(chunk.buffer).setUint32(0, value >>> 0, true);
    this.push(chunk);
  }

  u64(value: bigint): void {
    const chunk = new Uint8Array(8);
    new DataView(chunk.buffer).setBigUint64(0, BigInt.asUintN(64, value), true);
    this.push(chunk);
  }

  string(value: string): void {
    const bytes = encoder.encode(value);
    this.u32(bytes.length);
    this.push(bytes);
  }

  raw(bytes: Uint8Array): void {
    this.push(bytes);
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }
}

class ByteReader {
  private readonly dv: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.dv = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  private take(size: number, label: string): number {
    if (size > this.remaining) {
      throw new SignatureFileError(`Signature data is truncated while reading ${label} at offset ${this.offset}.`);
    }
    const at = this.offset;
    this.offset += size;
    return at;
  }

  u16(label: string): number {
    return this.dv.getUint16(this.take(2, label), true);
  }

  u32(label: string): number {
    return this.dv.getUint32(this.take(4, label), true);
  }

  u64(label: string): bigint {
    return this.dv.getBigUint64(this.take(8, label), true);
  }

  bytesOf(size: number, label: string): Uint8Array {
    const at = this.take(size, label);
    return this.bytes.subarray(at, at + size);
  }

  string(label: string): string {
    const size = this.u32(`${label} length`);
    const bytes = this.bytesOf(size, label);
    try {
      return decoder.decode(bytes);
    } catch (err) {
      throw new SignatureFileError(`${label} is not valid UTF-8.`, null, { cause: err });
    }
  }

  // Every element takes at least `minElementSize` bytes; reject counts the data cannot hold.
  count(label: string, minElementSize: number): number {
    const value = this.u32(`${label} count`);
    if (value * minElementSize > this.remaining) {
      throw new SignatureFileError(`${label} count ${value} exceeds the remaining signature data.`);
    }
    return value;
  }
}

const writeHashMap = (writer: ByteWriter, entries: ReadonlyMap<number, bigint>): void => {
  const sorted = [...entries].sort(([a], [b]) => compareNumbers(a, b));
  writer.u32(sorted.length);
  for (const [hash, address] of sorted) {
    writer.u32(hash);
    writer.u64(address);
  }
};

const writeBlock = (writer: ByteWriter, block: BlockSignature): void => {
  writer.u32(block.formalHash);
  writer.u32(block.fuzzyHash);
  writer.u32(block.immediates.length);
  for (const immediate of block.immediates) writer.u64(immediate);
  writer.u32(block.calledNames.length);
  for (const name of block.calledNames) writer.string(name);
};

export function serializeSignatureStore(store: SignatureStore): Uint8Array {
  const writer = new ByteWriter();
  writer.raw(encoder.encode(SIGNATURE_FILE_MAGIC));
  writer.u16(SIGNATURE_FILE_VERSION);
  writer.u16(0);
  writeHashMap(writer, store.formal);
  writeHashMap(writer, store.fuzzy);
  writeHashMap(writer, store.strings);

  const immediates = [...store.immediates].sort(([a], [b]) => compareBigints(a, b));
  writer.u32(immediates.length);
  for (const [value, address] of immediates) {
    writer.u64(value);
    writer.u64(address);
  }

  const functions = [...store.functions].sort(([a], [b]) => compareBigints(a, b));
  writer.u32(functions.length);
  for (const [address, signature] of functions) {
    writer.u64(address);
    writer.string(signature.name);
    writer.u32(signature.blocks.length);
    for (const block of signature.blocks) writeBlock(writer, block);
  }
  return writer.toBytes();
}

const readHashMap = (reader: ByteReader, label: string): Map<number, bigint> => {
  const entries = new Map<number, bigint>();
  const count = reader.count(label, 12);
  for (let index = 0; index < count; index += 1) {
    const hash = reader.u32(`${label} hash`);
    entries.set(hash, reader.u64(`${label} address`));
  }
  return entries;
};

const readBlock = (reader: ByteReader): BlockSignature => {
  const formalHash = reader.u32("block formal hash");
  const fuzzyHash = reader.u32("block fuzzy hash");
  const immediates: bigint[] = [];
  const immediateCount = reader.count("block immediates", 8);
  for (let index = 0; index < immediateCount; index += 1) immediates.push(reader.u64("block immediate"));
  const calledNames: string[] = [];
  const calledCount = reader.count("block called names", 4);
  for (let index = 0; index < calledCount; index += 1) calledNames.push(reader.string("called name"));
  return { formalHash, fuzzyHash, immediates, calledNames };
};

export function deserializeSignatureStore(bytes: Uint8Array): SignatureStore {
  const reader = new ByteReader(bytes);
  const magic = String.fromCharCode(...reader.bytesOf(4, "magic"));
  if (magic !== SIGNATURE_FILE_MAGIC) {
    throw new SignatureFileError("Not a signature file (bad magic).");
  }
  const version = reader.u16("version");
  if (version !== SIGNATURE_FILE_VERSION) {
    throw new SignatureFileError(`Unsupported signature file version ${version}.`);
  }
  reader.u16("reserved");

  const formal = readHashMap(reader, "formal signatures");
  const fuzzy = readHashMap(reader, "fuzzy signatures");
  const strings = readHashMap(reader, "string signatures");

  const immediates = new Map<bigint, bigint>();
  const immediateCount = reader.count("immediate signatures", 16);
  for (let index = 0; index < immediateCount; index += 1) {
    const value = reader.u64("immediate value");
    immediates.set(value, reader.u64("immediate address"));
  }

  const functions = new Map<bigint, FunctionSignature>();
  const functionCount = reader.count("functions", 16);
  for (let index = 0; index < functionCount; index += 1) {
    const address = reader.u64("function address");
    const name = reader.string("function name");
    const blocks: BlockSignature[] = [];
    const blockCount = reader.count("function blocks", 16);
    for (let blockIndex = 0; blockIndex < blockCount; blockIndex += 1) blocks.push(readBlock(reader));
    functions.set(address, { name, blocks });
  }

  if (reader.remaining !== 0) {
    throw new SignatureFileError(`Signature data has ${reader.remaining} unexpected trailing byte(s).`);
  }
  return { formal, fuzzy, strings, immediates, functions };
}

export async function saveSignatureFile(store: SignatureStore, path: string): Promise<number> {
  const bytes = serializeSignatureStore(store);
  try {
    await writeFile(path, bytes);
  } catch (err) {
    throw new SignatureFileError("Failed to write signature file", path, { cause: err });
  }
  return bytes.length;
}

export async function loadSignatureFile(path: string): Promise<SignatureStore> {
  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(await readFile(path));
  } catch (err) {
    throw new SignatureFileError("Failed to read signature file", path, { cause: err });
  }
  try {
    return deserializeSignatureStore(bytes);
  } catch (err) {
    if (err instanceof SignatureFileError) {
      throw new SignatureFileError(err.message, path, { cause: err });
    }
    throw err;
  }
}
