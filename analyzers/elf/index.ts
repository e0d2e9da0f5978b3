"use strict";
import { readAsciiString, toSafeIndex } from "../../binary-utils.js";
import type { ElfClass, ElfHeader, ElfParseResult, ElfProgramHeader, ElfSectionHeader } from "./types.js";

const ELF_MAGIC = 0x7f454c46;
const ELFCLASS64 = 2;
const ELFDATA2LSB = 1;
const EV_CURRENT = 1;

export const EM_386 = 3;
export const EM_X86_64 = 62;

const HEADER_SIZE: Record<ElfClass, number> = { 32: 0x34, 64: 0x40 };
const PROGRAM_HEADER_SIZE: Record<ElfClass, number> = { 32: 32, 64: 56 };
const SECTION_HEADER_SIZE: Record<ElfClass, number> = { 32: 40, 64: 64 };

/**
 * Reads fields whose offset and width depend on the ELF class. Each accessor takes the
 * ELF32 offset first and the ELF64 offset second; `addr` fields are 4 or 8 bytes wide.
 */
class ElfFieldReader {
  constructor(
    private readonly view: DataView,
    private readonly elfClass: ElfClass,
    private readonly littleEndian: boolean
  ) {}

  private at(offset32: number, offset64: number): number {
    return this.elfClass === 64 ? offset64 : offset32;
  }

  u16(offset32: number, offset64 = offset32): number {
    return this.view.getUint16(this.at(offset32, offset64), this.littleEndian);
  }

  u32(offset32: number, offset64 = offset32): number {
    return this.view.getUint32(this.at(offset32, offset64), this.littleEndian);
  }

  addr(offset32: number, offset64: number): bigint {
    const offset = this.at(offset32, offset64);
    return this.elfClass === 64
      ? this.view.getBigUint64(offset, this.littleEndian)
      : BigInt(this.view.getUint32(offset, this.littleEndian));
  }
}

type TableRead = { view: DataView | null; truncated: boolean };

async function readFileRange(file: File, offset: number, length: number): Promise<TableRead> {
  const end = Math.min(file.size, offset + length);
  if (offset >= file.size || end <= offset) return { view: null, truncated: true };
  const buffer = await file.slice(offset, end).arrayBuffer();
  return { view: new DataView(buffer), truncated: buffer.byteLength !== length };
}

const readHeader = (fields: ElfFieldReader, issues: string[]): ElfHeader => {
  const version = fields.u32(0x14);
  if (version !== EV_CURRENT) issues.push(`Unexpected ELF header version ${version}.`);
  return {
    type: fields.u16(0x10),
    machine: fields.u16(0x12),
    entry: fields.addr(0x18, 0x18),
    phoff: fields.addr(0x1c, 0x20),
    phentsize: fields.u16(0x2a, 0x36),
    phnum: fields.u16(0x2c, 0x38),
    shoff: fields.addr(0x20, 0x28),
    shentsize: fields.u16(0x2e, 0x3a),
    shnum: fields.u16(0x30, 0x3c),
    shstrndx: fields.u16(0x32, 0x3e)
  };
};

const readProgramHeader = (fields: ElfFieldReader, index: number): ElfProgramHeader => ({
  index,
  type: fields.u32(0),
  flags: fields.u32(24, 4),
  offset: fields.addr(4, 8),
  vaddr: fields.addr(8, 16),
  filesz: fields.addr(16, 32),
  memsz: fields.addr(20, 40)
});

type RawSectionHeader = ElfSectionHeader & { nameOffset: number };

const readSectionHeader = (fields: ElfFieldReader, index: number): RawSectionHeader => ({
  index,
  name: "",
  nameOffset: fields.u32(0),
  type: fields.u32(4),
  flags: fields.addr(8, 8),
  addr: fields.addr(12, 16),
  offset: fields.addr(16, 24),
  size: fields.addr(20, 32),
  link: fields.u32(24, 40),
  entsize: fields.addr(36, 56)
});

type TableSpec = {
  label: string;
  offset: bigint;
  entrySize: number;
  minEntrySize: number;
  count: number;
};

async function readTable<T>(
  file: File,
  spec: TableSpec,
  issues: string[],
  readEntry: (view: DataView, index: number) => T
): Promise<T[]> {
  if (spec.offset === 0n || spec.count === 0) return [];
  const offset = toSafeIndex(spec.offset, `${spec.label} offset`, issues);
  if (offset == null) return [];
  if (spec.entrySize < spec.minEntrySize) {
    issues.push(`${spec.label} entry size ${spec.entrySize} is smaller than ${spec.minEntrySize} bytes.`);
    return [];
  }
  const { view, truncated } = await readFileRange(file, offset, spec.entrySize * spec.count);
  if (!view) {
    issues.push(`${spec.label} falls outside the file.`);
    return [];
  }
  if (truncated) issues.push(`${spec.label} is truncated.`);
  const available = Math.min(spec.count, Math.floor(view.byteLength / spec.entrySize));
  return Array.from({ length: available }, (_, index) =>
    readEntry(new DataView(view.buffer, index * spec.entrySize, spec.entrySize), index)
  );
}

async function nameSections(
  file: File,
  raw: RawSectionHeader[],
  shstrndx: number,
  issues: string[]
): Promise<ElfSectionHeader[]> {
  const names = await readSectionNames(file, raw[shstrndx], raw.length > 0, issues);
  return raw.map(({ nameOffset, ...section }) => ({
    ...section,
    name: names && nameOffset < names.byteLength ? readAsciiString(names, nameOffset, names.byteLength - nameOffset) : ""
  }));
}

async function readSectionNames(
  file: File,
  table: RawSectionHeader | undefined,
  expected: boolean,
  issues: string[]
): Promise<DataView | null> {
  if (!table) {
    if (expected) issues.push("Section name table header is missing.");
    return null;
  }
  const offset = toSafeIndex(table.offset, "Section name table offset", issues);
  const size = toSafeIndex(table.size, "Section name table size", issues);
  if (offset == null || size == null) return null;
  const { view, truncated } = await readFileRange(file, offset, size);
  if (!view) {
    issues.push("Section name table falls outside the file.");
    return null;
  }
  if (truncated) issues.push("Section name table is truncated.");
  return view;
}

/** Parses the ELF header and its program and section header tables; null when `file` is not ELF. */
export async function parseElf(file: File): Promise<ElfParseResult | null> {
  const prefix = new DataView(await file.slice(0, Math.min(file.size, HEADER_SIZE[64])).arrayBuffer());
  if (prefix.byteLength < HEADER_SIZE[32] || prefix.getUint32(0, false) !== ELF_MAGIC) return null;
  const elfClass: ElfClass = prefix.getUint8(4) === ELFCLASS64 ? 64 : 32;
  if (prefix.byteLength < HEADER_SIZE[elfClass]) return null;
  const littleEndian = prefix.getUint8(5) === ELFDATA2LSB;

  const issues: string[] = [];
  const identVersion = prefix.getUint8(6);
  if (identVersion !== EV_CURRENT) issues.push(`Unexpected ELF version ${identVersion}.`);
  const header = readHeader(new ElfFieldReader(prefix, elfClass, littleEndian), issues);

  const programHeaders = await readTable(
    file,
    {
      label: "Program header table",
      offset: header.phoff,
      entrySize: header.phentsize,
      minEntrySize: PROGRAM_HEADER_SIZE[elfClass],
      count: header.phnum
    },
    issues,
    (view, index) => readProgramHeader(new ElfFieldReader(view, elfClass, littleEndian), index)
  );
  const rawSections = await readTable(
    file,
    {
      label: "Section header table",
      offset: header.shoff,
      entrySize: header.shentsize,
      minEntrySize: SECTION_HEADER_SIZE[elfClass],
      count: header.shnum
    },
    issues,
    (view, index) => readSectionHeader(new ElfFieldReader(view, elfClass, littleEndian), index)
  );
  const sections = await nameSections(file, rawSections, header.shstrndx, issues);

  return { header, programHeaders, sections, is64: elfClass === 64, littleEndian, issues };
}
