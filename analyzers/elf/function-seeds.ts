"use strict";

import { toSafeIndex } from "../../binary-utils.js";
import type { ElfProgramHeader, ElfSectionHeader } from "./types.js";

const PT_LOAD = 1;
const PT_DYNAMIC = 2;
const PT_GNU_EH_FRAME = 0x6474e550;

const SHT_INIT_ARRAY = 14;
const SHT_FINI_ARRAY = 15;
const SHT_PREINIT_ARRAY = 16;

const DT_NULL = 0;
const DT_INIT = 12;
const DT_FINI = 13;
const DT_INIT_ARRAY = 25;
const DT_FINI_ARRAY = 26;
const DT_INIT_ARRAYSZ = 27;
const DT_FINI_ARRAYSZ = 28;
const DT_PREINIT_ARRAY = 32;
const DT_PREINIT_ARRAYSZ = 33;

const DW_EH_PE_omit = 0xff;
const DW_EH_PE_indirect = 0x80;
const DW_EH_PE_pcrel = 0x10;
const DW_EH_PE_datarel = 0x30;

/** Addresses that start functions, grouped by where the image records them. */
export type FunctionSeedGroup = {
  source: string;
  vaddrs: bigint[];
};

export type FunctionSeedOptions = {
  file: File;
  programHeaders: ElfProgramHeader[];
  sections: ElfSectionHeader[];
  is64: boolean;
  littleEndian: boolean;
  issues: string[];
};

const readBytes = async (
  file: File,
  offset: bigint,
  size: bigint,
  label: string,
  issues: string[]
): Promise<Uint8Array | null> => {
  const start = toSafeIndex(offset, `${label} offset`, issues);
  const length = toSafeIndex(size, `${label} size`, issues);
  if (start == null || length == null || length <= 0) return null;
  const end = Math.min(file.size, start + length);
  if (start >= file.size || end <= start) {
    issues.push(`${label} falls outside the file.`);
    return null;
  }
  if (end !== start + length) issues.push(`${label} extends past end of file; truncating to available bytes.`);
  return new Uint8Array(await file.slice(start, end).arrayBuffer());
};

const viewOf = (bytes: Uint8Array): DataView => new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

const readPointers = (bytes: Uint8Array, opts: FunctionSeedOptions, label: string): bigint[] => {
  const size = opts.is64 ? 8 : 4;
  if (bytes.length % size !== 0) opts.issues.push(`${label} size is not a multiple of ${size} bytes.`);
  const dv = viewOf(bytes);
  const vaddrs: bigint[] = [];
  for (let offset = 0; offset + size <= bytes.length; offset += size) {
    const value = opts.is64 ? dv.getBigUint64(offset, opts.littleEndian) : BigInt(dv.getUint32(offset, opts.littleEndian));
    if (value !== 0n) vaddrs.push(value);
  }
  return vaddrs;
};

type Decoded = { value: bigint; size: number };

const readLeb128 = (bytes: Uint8Array, start: number, signed: boolean): Decoded | null => {
  let value = 0n;
  let shift = 0n;
  for (let index = 0; index < 10 && start + index < bytes.length; index += 1) {
    const byte = bytes[start + index] ?? 0;
    value |= BigInt(byte & 0x7f) << shift;
    shift += 7n;
    if ((byte & 0x80) === 0) {
      if (signed && (byte & 0x40) !== 0) value |= -1n << shift;
      return { value, size: index + 1 };
    }
  }
  return null;
};

type PointerContext = {
  bytes: Uint8Array;
  dv: DataView;
  is64: boolean;
  littleEndian: boolean;
  // Address the first byte of `bytes` is mapped at.
  vaddr: bigint;
};

const readRawPointer = (ctx: PointerContext, format: number, offset: number): Decoded | null => {
  const { dv, littleEndian: le } = ctx;
  const fixed = (size: number, read: () => bigint): Decoded | null =>
    offset + size <= dv.byteLength ? { value: read(), size } : null;
  switch (format) {
    case 0x00:
      return ctx.is64 ? fixed(8, () => dv.getBigUint64(offset, le)) : fixed(4, () => BigInt(dv.getUint32(offset, le)));
    case 0x01:
      return readLeb128(ctx.bytes, offset, false);
    case 0x02:
      return fixed(2, () => BigInt(dv.getUint16(offset, le)));
    case 0x03:
      return fixed(4, () => BigInt(dv.getUint32(offset, le)));
    case 0x04:
      return fixed(8, () => dv.getBigUint64(offset, le));
    case 0x09:
      return readLeb128(ctx.bytes, offset, true);
    case 0x0a:
      return fixed(2, () => BigInt(dv.getInt16(offset, le)));
    case 0x0b:
      return fixed(4, () => BigInt(dv.getInt32(offset, le)));
    case 0x0c:
      return fixed(8, () => dv.getBigInt64(offset, le));
    default:
      return null;
  }
};

/** Reads a DWARF exception-header pointer; `value` is null for an omitted field. */
const readEncodedPointer = (
  ctx: PointerContext,
  encoding: number,
  offset: number
): { value: bigint | null; size: number } | null => {
  if (encoding === DW_EH_PE_omit) return { value: null, size: 0 };
  if ((encoding & DW_EH_PE_indirect) !== 0) return null;
  const raw = readRawPointer(ctx, encoding & 0x0f, offset);
  if (!raw) return null;
  switch (encoding & 0x70) {
    case 0:
      return raw;
    case DW_EH_PE_pcrel:
      return { value: BigInt.asUintN(64, ctx.vaddr + BigInt(offset) + raw.value), size: raw.size };
    case DW_EH_PE_datarel:
      return { value: BigInt.asUintN(64, ctx.vaddr + raw.value), size: raw.size };
    default:
      return null;
  }
};

async function collectEhFrameHdrSeeds(opts: FunctionSeedOptions): Promise<FunctionSeedGroup[]> {
  const segment = opts.programHeaders.find(ph => ph.type === PT_GNU_EH_FRAME && ph.filesz > 0n);
  const section = opts.sections.find(sec => sec.name === ".eh_frame_hdr" && sec.size > 0n);
  const location = segment
    ? { offset: segment.offset, size: segment.filesz, vaddr: segment.vaddr }
    : section
      ? { offset: section.offset, size: section.size, vaddr: section.addr }
      : null;
  if (!location) return [];
  const bytes = await readBytes(opts.file, location.offset, location.size, ".eh_frame_hdr", opts.issues);
  if (!bytes || bytes.length < 4) return [];
  const version = bytes[0] ?? 0;
  if (version !== 1) {
    opts.issues.push(`.eh_frame_hdr has unsupported version ${version}.`);
    return [];
  }

  const ctx: PointerContext = {
    bytes,
    dv: viewOf(bytes),
    is64: opts.is64,
    littleEndian: opts.littleEndian,
    vaddr: location.vaddr
  };
  const frame = readEncodedPointer(ctx, bytes[1] ?? DW_EH_PE_omit, 4);
  const count = frame ? readEncodedPointer(ctx, bytes[2] ?? DW_EH_PE_omit, 4 + frame.size) : null;
  if (!frame || !count) {
    opts.issues.push(".eh_frame_hdr uses a pointer encoding that cannot be read.");
    return [];
  }
  const tableEncoding = bytes[3] ?? DW_EH_PE_omit;
  const vaddrs: bigint[] = [];
  let cursor = 4 + frame.size + count.size;
  for (let index = 0n; index < (count.value ?? 0n); index += 1n) {
    const startPc = readEncodedPointer(ctx, tableEncoding, cursor);
    if (!startPc || startPc.size === 0) break;
    const fde = readEncodedPointer(ctx, tableEncoding, cursor + startPc.size);
    if (!fde) break;
    cursor += startPc.size + fde.size;
    if (startPc.value) vaddrs.push(startPc.value);
  }
  return vaddrs.length ? [{ source: ".eh_frame_hdr start PCs", vaddrs }] : [];
}

const ARRAY_SECTION_KINDS = new Map<number, string>([
  [SHT_PREINIT_ARRAY, "SHT_PREINIT_ARRAY"],
  [SHT_INIT_ARRAY, "SHT_INIT_ARRAY"],
  [SHT_FINI_ARRAY, "SHT_FINI_ARRAY"]
]);

async function collectArraySectionSeeds(opts: FunctionSeedOptions): Promise<FunctionSeedGroup[]> {
  const groups: FunctionSeedGroup[] = [];
  for (const sec of opts.sections) {
    const kind = ARRAY_SECTION_KINDS.get(sec.type);
    if (!kind || sec.size === 0n) continue;
    const source = `${sec.name || `Section #${sec.index}`} (${kind})`;
    const bytes = await readBytes(opts.file, sec.offset, sec.size, source, opts.issues);
    if (!bytes) continue;
    const vaddrs = readPointers(bytes, opts, source);
    if (vaddrs.length) groups.push({ source, vaddrs });
  }
  return groups;
}

const readDynamicTags = (bytes: Uint8Array, opts: FunctionSeedOptions): Map<number, bigint> => {
  const entrySize = opts.is64 ? 16 : 8;
  const dv = viewOf(bytes);
  const tags = new Map<number, bigint>();
  for (let offset = 0; offset + entrySize <= bytes.length; offset += entrySize) {
    const tag = opts.is64 ? Number(dv.getBigInt64(offset, opts.littleEndian)) : dv.getInt32(offset, opts.littleEndian);
    if (tag === DT_NULL) break;
    const value = opts.is64
      ? dv.getBigUint64(offset + 8, opts.littleEndian)
      : BigInt(dv.getUint32(offset + 4, opts.littleEndian));
    if (!tags.has(tag)) tags.set(tag, value);
  }
  return tags;
};

const vaddrToFileOffset = (programHeaders: ElfProgramHeader[], vaddr: bigint): bigint | null => {
  const segment = programHeaders.find(
    ph => ph.type === PT_LOAD && vaddr >= ph.vaddr && vaddr < ph.vaddr + ph.filesz
  );
  return segment ? segment.offset + (vaddr - segment.vaddr) : null;
};

const DYNAMIC_ARRAYS: Array<[number, number, string]> = [
  [DT_PREINIT_ARRAY, DT_PREINIT_ARRAYSZ, "DT_PREINIT_ARRAY"],
  [DT_INIT_ARRAY, DT_INIT_ARRAYSZ, "DT_INIT_ARRAY"],
  [DT_FINI_ARRAY, DT_FINI_ARRAYSZ, "DT_FINI_ARRAY"]
];

async function collectDynamicSeeds(opts: FunctionSeedOptions): Promise<FunctionSeedGroup[]> {
  const segment = opts.programHeaders.find(ph => ph.type === PT_DYNAMIC && ph.filesz > 0n);
  if (!segment) return [];
  const bytes = await readBytes(opts.file, segment.offset, segment.filesz, "PT_DYNAMIC", opts.issues);
  if (!bytes) return [];
  const tags = readDynamicTags(bytes, opts);

  const groups: FunctionSeedGroup[] = [];
  for (const [tag, source] of [[DT_INIT, "DT_INIT"], [DT_FINI, "DT_FINI"]] as const) {
    const vaddr = tags.get(tag);
    if (vaddr) groups.push({ source, vaddrs: [vaddr] });
  }
  for (const [arrayTag, sizeTag, source] of DYNAMIC_ARRAYS) {
    const vaddr = tags.get(arrayTag);
    const size = tags.get(sizeTag);
    if (!vaddr || !size) continue;
    const offset = vaddrToFileOffset(opts.programHeaders, vaddr);
    if (offset == null) {
      opts.issues.push(`${source} does not map into a PT_LOAD segment.`);
      continue;
    }
    const array = await readBytes(opts.file, offset, size, source, opts.issues);
    if (!array) continue;
    const vaddrs = readPointers(array, opts, source);
    if (vaddrs.length) groups.push({ source, vaddrs });
  }
  return groups;
}

/**
 * Collects function starts the image records outside its symbol tables: the `.eh_frame_hdr`
 * search table, init/fini pointer array sections, and the dynamic segment's DT_INIT, DT_FINI
 * and array entries. Addresses are not checked against the code; callers filter them.
 */
export async function collectElfFunctionSeeds(opts: FunctionSeedOptions): Promise<FunctionSeedGroup[]> {
  return [
    ...(await collectEhFrameHdrSeeds(opts)),
    ...(await collectArraySectionSeeds(opts)),
    ...(await collectDynamicSeeds(opts))
  ];
}
