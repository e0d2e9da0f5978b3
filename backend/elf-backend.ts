"use strict";

import { collectTerminatedStrings, toHex64, toSafeIndex } from "../binary-utils.js";
import { getElfDataRegions, getElfExecutableRegions, getElfMappedRanges } from "../analyzers/elf/executable-regions.js";
import type { ElfRegion } from "../analyzers/elf/executable-regions.js";
import { collectElfFunctionSeeds } from "../analyzers/elf/function-seeds.js";
import { EM_386, EM_X86_64, parseElf } from "../analyzers/elf/index.js";
import { isFunctionSymbolType, parseElfSymbols } from "../analyzers/elf/symbols.js";
import type { ElfSymbol } from "../analyzers/elf/types.js";
import { loadIcedX86 } from "../analyzers/x86/disassembly-iced.js";
import type { IcedX86Module } from "../analyzers/x86/disassembly-iced.js";
import { FunctionFlowDecoder } from "../analyzers/x86/function-flow.js";
import type { CodeRegion, DecodedFunction, DecodedInstruction } from "../analyzers/x86/function-flow.js";
import { ListingBackend } from "./listing-backend.js";
import type { AddressRange, ListingString, ProgramListing } from "./listing-backend.js";
import type { BackendFunction, BackendInstruction } from "./types.js";

const ET_REL = 1;

export const MIN_LISTED_STRING_LENGTH = 4;

// Immediates below this are treated as plain numbers even when they land in mapped memory;
// position-independent images map their headers at address 0.
export const MIN_IMMEDIATE_ADDRESS = 0x10000n;

export type ElfListingOptions = {
  iced?: IcedX86Module;
  minStringLength?: number;
};

const readRegionBytes = async (file: File, region: ElfRegion, issues: string[]): Promise<Uint8Array | null> => {
  const start = toSafeIndex(region.fileOffset, `${region.label} offset`, issues);
  const size = toSafeIndex(region.fileSize, `${region.label} size`, issues);
  if (start == null || size == null || size <= 0) return null;
  const end = Math.min(file.size, start + size);
  if (start >= file.size || end <= start) {
    issues.push(`${region.label} falls outside the file.`);
    return null;
  }
  if (end !== start + size) issues.push(`${region.label} extends past end of file; truncating to available bytes.`);
  return new Uint8Array(await file.slice(start, end).arrayBuffer());
};

const readRegions = async (file: File, regions: ElfRegion[], issues: string[]): Promise<CodeRegion[]> => {
  const out: CodeRegion[] = [];
  for (const region of regions) {
    const data = await readRegionBytes(file, region, issues);
    if (data && data.length > 0) out.push({ vaddrStart: region.vaddr, data });
  }
  return out;
};

const collectNames = (symbols: ElfSymbol[], issues: string[]): Map<bigint, string> => {
  const names = new Map<bigint, string>();
  const owners = new Map<string, bigint>();
  for (const symbol of symbols) {
    if (symbol.value === 0n || names.has(symbol.value)) continue;
    const owner = owners.get(symbol.name);
    if (owner != null) {
      if (owner !== symbol.value) {
        issues.push(`Symbol ${symbol.name} is defined at both ${toHex64(owner)} and ${toHex64(symbol.value)}; keeping the first.`);
      }
      continue;
    }
    names.set(symbol.value, symbol.name);
    owners.set(symbol.name, symbol.value);
  }
  return names;
};

const uniqueBigints = (values: bigint[]): bigint[] => [...new Set(values)];

const toBackendInstruction = (
  instruction: DecodedInstruction,
  isMapped: (value: bigint) => boolean
): BackendInstruction => ({
  address: instruction.address,
  mnemonic: instruction.mnemonic,
  operands: instruction.operands.map(operand => ({ ...operand })),
  isCall: instruction.isCall,
  dataRefs: uniqueBigints([
    ...instruction.memoryTargets.filter(isMapped),
    ...instruction.immediateValues.filter(value => value >= MIN_IMMEDIATE_ADDRESS && isMapped(value))
  ]),
  codeRefs: instruction.branchTarget != null ? [instruction.branchTarget] : []
});

const toBackendFunction = (fn: DecodedFunction, isMapped: (value: bigint) => boolean): BackendFunction => ({
  start: fn.start,
  blocks: fn.blocks.map(block => ({
    start: block.start,
    end: block.end,
    instructions: block.instructions.map(instruction => toBackendInstruction(instruction, isMapped))
  }))
});

const compareBigints = (a: bigint, b: bigint): number => (a < b ? -1 : a > b ? 1 : 0);

// Code addresses loaded with lea or as immediates, such as callbacks passed by pointer.
const takenAddresses = (instruction: DecodedInstruction): bigint[] => [
  ...(instruction.mnemonic === "lea" ? instruction.memoryTargets : []),
  ...instruction.immediateValues.filter(value => value >= MIN_IMMEDIATE_ADDRESS)
];

/**
 * Finds functions from the seeded starts, direct call targets and taken code addresses that
 * no decoded function already covers, then decodes every function once more against the
 * final set of starts so no function runs into another one.
 */
const decodeFunctions = (
  decoder: FunctionFlowDecoder,
  starts: Map<bigint, bigint | null>,
  issues: string[]
): DecodedFunction[] => {
  const isFunctionStart = (vaddr: bigint): boolean => starts.has(vaddr);
  const discoveryIssues: string[] = [];
  const visited = new Set<bigint>();
  const decodedAddresses = new Set<bigint>();
  const taken: bigint[] = [];
  const queue = [...starts.keys()].sort(compareBigints);
  while (queue.length > 0) {
    while (queue.length > 0) {
      const start = queue.shift();
      if (start == null) break;
      if (visited.has(start)) continue;
      visited.add(start);
      const fn = decoder.decodeFunction({ start, end: starts.get(start) ?? null, isFunctionStart, issues: discoveryIssues });
      for (const target of fn.callTargets) {
        if (starts.has(target) || !decoder.isExecutable(target)) continue;
        starts.set(target, null);
        queue.push(target);
      }
      for (const block of fn.blocks) {
        for (const instruction of block.instructions) {
          decodedAddresses.add(instruction.address);
          taken.push(...takenAddresses(instruction));
        }
      }
    }
    for (const vaddr of uniqueBigints(taken.splice(0)).sort(compareBigints)) {
      if (starts.has(vaddr) || decodedAddresses.has(vaddr) || !decoder.isExecutable(vaddr)) continue;
      starts.set(vaddr, null);
      queue.push(vaddr);
    }
  }

  const functions: DecodedFunction[] = [];
  for (const start of [...starts.keys()].sort(compareBigints)) {
    const fn = decoder.decodeFunction({ start, end: starts.get(start) ?? null, isFunctionStart, issues });
    if (fn.blocks.length === 0) {
      issues.push(`Function ${toHex64(start)} could not be decoded and was skipped.`);
      continue;
    }
    functions.push(fn);
  }
  return functions;
};

const collectStrings = async (
  file: File,
  regions: ElfRegion[],
  references: ReadonlyMap<bigint, bigint[]>,
  minLength: number,
  issues: string[]
): Promise<ListingString[]> => {
  const strings: ListingString[] = [];
  for (const region of regions) {
    const bytes = await readRegionBytes(file, region, issues);
    if (!bytes) continue;
    for (const entry of collectTerminatedStrings(bytes, minLength)) {
      const address = region.vaddr + BigInt(entry.offset);
      strings.push({ address, text: entry.text, referencingAddresses: references.get(address) ?? [] });
    }
  }
  return strings;
};

/** Decodes an ELF x86 or x86-64 executable or shared object into a program listing. */
export async function loadElfListing(file: File, opts: ElfListingOptions = {}): Promise<ProgramListing> {
  const elf = await parseElf(file);
  if (!elf) throw new Error("Not an ELF file.");
  if (elf.header.type === ET_REL) throw new Error("Relocatable object files are not supported; link them first.");
  const bitness = elf.header.machine === EM_X86_64 ? 64 : elf.header.machine === EM_386 ? 32 : null;
  if (bitness == null) {
    throw new Error(`Unsupported ELF machine ${elf.header.machine}; only x86 and x86-64 are supported.`);
  }
  if (!elf.littleEndian) throw new Error("Big-endian x86 ELF files are not supported.");

  const issues = [...elf.issues];
  const iced = opts.iced ?? (await loadIcedX86());
  const symbols = await parseElfSymbols({
    file,
    sections: elf.sections,
    is64: elf.is64,
    littleEndian: elf.littleEndian,
    issues
  });
  const names = collectNames(symbols, issues);
  const seeds = await collectElfFunctionSeeds({
    file,
    programHeaders: elf.programHeaders,
    sections: elf.sections,
    is64: elf.is64,
    littleEndian: elf.littleEndian,
    issues
  });
  const mappedRanges: AddressRange[] = getElfMappedRanges(elf.programHeaders, elf.sections);
  const isMapped = (value: bigint): boolean => mappedRanges.some(range => value >= range.start && value < range.end);

  const codeRegions = await readRegions(file, getElfExecutableRegions(elf.programHeaders, elf.sections), issues);
  if (codeRegions.length === 0) issues.push("No executable code found.");

  const decoder = new FunctionFlowDecoder({ iced, bitness, regions: codeRegions });
  let decoded: DecodedFunction[];
  try {
    const starts = new Map<bigint, bigint | null>();
    for (const symbol of symbols) {
      if (!isFunctionSymbolType(symbol.type) || !decoder.isExecutable(symbol.value)) continue;
      const end = symbol.size > 0n ? symbol.value + symbol.size : null;
      if (!starts.has(symbol.value) || (starts.get(symbol.value) == null && end != null)) starts.set(symbol.value, end);
    }
    if (decoder.isExecutable(elf.header.entry) && !starts.has(elf.header.entry)) starts.set(elf.header.entry, null);
    for (const group of seeds) {
      for (const vaddr of group.vaddrs) {
        if (decoder.isExecutable(vaddr) && !starts.has(vaddr)) starts.set(vaddr, null);
      }
    }
    decoded = decodeFunctions(decoder, starts, issues);
  } finally {
    decoder.free();
  }

  const functions = decoded.map(fn => toBackendFunction(fn, isMapped));
  const references = new Map<bigint, bigint[]>();
  for (const fn of functions) {
    for (const block of fn.blocks) {
      for (const instruction of block.instructions) {
        for (const target of instruction.dataRefs) {
          const list = references.get(target);
          if (list) list.push(instruction.address);
          else references.set(target, [instruction.address]);
        }
      }
    }
  }
  const strings = await collectStrings(
    file,
    getElfDataRegions(elf.sections),
    references,
    opts.minStringLength ?? MIN_LISTED_STRING_LENGTH,
    issues
  );

  return { functions, strings, names, mappedRanges, issues };
}

export async function openElfBackend(file: File, opts: ElfListingOptions = {}): Promise<ListingBackend> {
  return new ListingBackend(await loadElfListing(file, opts));
}
