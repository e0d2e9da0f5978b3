"use strict";

import { readAsciiString, toSafeIndex } from "../../binary-utils.js";
import type { ElfSectionHeader, ElfSymbol } from "./types.js";

const SHT_SYMTAB = 2;
const SHT_DYNSYM = 11;

const SHN_UNDEF = 0;
const SHN_LORESERVE = 0xff00;

export const STT_NOTYPE = 0;
export const STT_OBJECT = 1;
export const STT_FUNC = 2;
export const STT_GNU_IFUNC = 10;

const readDataViewSlice = async (
  file: File,
  offset: bigint,
  size: bigint,
  label: string,
  issues: string[]
): Promise<DataView | null> => {
  const start = toSafeIndex(offset, `${label} offset`, issues);
  const byteSize = toSafeIndex(size, `${label} size`, issues);
  if (start == null || byteSize == null || byteSize <= 0) return null;
  const end = Math.min(file.size, start + byteSize);
  if (start >= file.size || end <= start) {
    issues.push(`${label} falls outside the file.`);
    return null;
  }
  if (end !== start + byteSize) issues.push(`${label} is truncated.`);
  const bytes = new Uint8Array(await file.slice(start, end).arrayBuffer());
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
};

const readString = (table: DataView | null, offset: number): string => {
  if (!table || offset < 0 || offset >= table.byteLength) return "";
  return readAsciiString(table, offset, table.byteLength - offset);
};

export const isFunctionSymbolType = (type: number): boolean => type === STT_FUNC || type === STT_GNU_IFUNC;

const isNamingType = (type: number): boolean =>
  type === STT_NOTYPE || type === STT_OBJECT || isFunctionSymbolType(type);

const parseSymbolTable = (
  symtab: DataView,
  strtab: DataView | null,
  opts: { is64: boolean; littleEndian: boolean; source: string; entsize: number },
  issues: string[]
): ElfSymbol[] => {
  const defaultEntrySize = opts.is64 ? 24 : 16;
  const entrySize = opts.entsize >= defaultEntrySize ? opts.entsize : defaultEntrySize;
  if (symtab.byteLength % entrySize !== 0) {
    issues.push(`${opts.source} size is not aligned to entry size (${entrySize} bytes).`);
  }
  const little = opts.littleEndian;
  const count = Math.floor(symtab.byteLength / entrySize);
  const out: ElfSymbol[] = [];
  // Entry 0 is the reserved null symbol.
  for (let index = 1; index < count; index += 1) {
    const base = index * entrySize;
    const nameOff = symtab.getUint32(base, little);
    let value: bigint;
    let size: bigint;
    let info: number;
    let shndx: number;
    if (opts.is64) {
      info = symtab.getUint8(base + 4);
      shndx = symtab.getUint16(base + 6, little);
      value = symtab.getBigUint64(base + 8, little);
      size = symtab.getBigUint64(base + 16, little);
    } else {
      value = BigInt(symtab.getUint32(base + 4, little));
      size = BigInt(symtab.getUint32(base + 8, little));
      info = symtab.getUint8(base + 12);
      shndx = symtab.getUint16(base + 14, little);
    }
    const type = info & 0x0f;
    if (!isNamingType(type)) continue;
    if (shndx === SHN_UNDEF || shndx >= SHN_LORESERVE) continue;
    const name = readString(strtab, nameOff);
    if (!name) continue;
    out.push({ name, value, size, bind: info >> 4, type, shndx, source: opts.source });
  }
  return out;
};

/**
 * Defined, named symbols from `.symtab` and `.dynsym`, in table order (`.symtab` first).
 * Imports are left out: they have no address in this file.
 */
export async function parseElfSymbols(opts: {
  file: File;
  sections: ElfSectionHeader[];
  is64: boolean;
  littleEndian: boolean;
  issues: string[];
}): Promise<ElfSymbol[]> {
  const tables = [
    ...opts.sections.filter(sec => sec.type === SHT_SYMTAB),
    ...opts.sections.filter(sec => sec.type === SHT_DYNSYM)
  ];
  const symbols: ElfSymbol[] = [];
  for (const table of tables) {
    if (table.size <= 0n) continue;
    const source = table.name || (table.type === SHT_DYNSYM ? "SHT_DYNSYM" : "SHT_SYMTAB");
    const symtab = await readDataViewSlice(opts.file, table.offset, table.size, source, opts.issues);
    if (!symtab) continue;
    const linked = opts.sections[table.link];
    const strtab =
      linked && linked.size > 0n
        ? await readDataViewSlice(opts.file, linked.offset, linked.size, `${source} string table`, opts.issues)
        : null;
    if (!strtab) opts.issues.push(`${source} has no string table; its symbols are unnamed.`);
    symbols.push(
      ...parseSymbolTable(
        symtab,
        strtab,
        { is64: opts.is64, littleEndian: opts.littleEndian, source, entsize: Number(table.entsize) },
        opts.issues
      )
    );
  }
  return symbols;
}
