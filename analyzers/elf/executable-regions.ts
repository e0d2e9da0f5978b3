"use strict";

import type { ElfProgramHeader, ElfSectionHeader } from "./types.js";

const PT_LOAD = 1;
const PF_X = 0x1;
const SHF_ALLOC = 0x2n;
const SHF_EXECINSTR = 0x4n;
const SHT_PROGBITS = 1;
const SHT_NOBITS = 8;

export type ElfRegion = {
  label: string;
  fileOffset: bigint;
  fileSize: bigint;
  vaddr: bigint;
};

const isExecutableLoadSegment = (ph: ElfProgramHeader): boolean => ph.type === PT_LOAD && (ph.flags & PF_X) !== 0;

const isAllocatedSection = (sec: ElfSectionHeader): boolean => (sec.flags & SHF_ALLOC) !== 0n;

const isExecutableSection = (sec: ElfSectionHeader): boolean =>
  sec.type !== SHT_NOBITS && (sec.flags & SHF_EXECINSTR) !== 0n;

const sectionLabel = (sec: ElfSectionHeader): string => (sec.name ? `"${sec.name}"` : `#${sec.index}`);

/** Code to decode: executable sections, or executable PT_LOAD segments when there are no sections. */
export const getElfExecutableRegions = (
  programHeaders: ElfProgramHeader[],
  sections: ElfSectionHeader[]
): ElfRegion[] => {
  const sectionRegions = sections
    .filter(isExecutableSection)
    .filter(sec => sec.size > 0n && sec.addr > 0n)
    .map(sec => ({
      label: `Section ${sectionLabel(sec)} (SHF_EXECINSTR)`,
      fileOffset: sec.offset,
      fileSize: sec.size,
      vaddr: sec.addr
    }));
  if (sectionRegions.length) return sectionRegions;

  return programHeaders
    .filter(isExecutableLoadSegment)
    .filter(ph => ph.filesz > 0n)
    .map(ph => ({
      label: `Segment #${ph.index} (PT_LOAD + PF_X)`,
      fileOffset: ph.offset,
      fileSize: ph.filesz,
      vaddr: ph.vaddr
    }));
};

/** Allocated, initialized, non-executable sections that may hold string literals. */
export const getElfDataRegions = (sections: ElfSectionHeader[]): ElfRegion[] =>
  sections
    .filter(sec => sec.type === SHT_PROGBITS && isAllocatedSection(sec) && !isExecutableSection(sec))
    .filter(sec => sec.size > 0n)
    .map(sec => ({
      label: `Section ${sectionLabel(sec)}`,
      fileOffset: sec.offset,
      fileSize: sec.size,
      vaddr: sec.addr
    }));

/** Virtual address ranges the image occupies once loaded. */
export const getElfMappedRanges = (
  programHeaders: ElfProgramHeader[],
  sections: ElfSectionHeader[]
): Array<{ start: bigint; end: bigint }> => {
  const segmentRanges = programHeaders
    .filter(ph => ph.type === PT_LOAD && ph.memsz > 0n)
    .map(ph => ({ start: ph.vaddr, end: ph.vaddr + ph.memsz }));
  if (segmentRanges.length) return segmentRanges;
  return sections
    .filter(sec => isAllocatedSection(sec) && sec.size > 0n)
    .map(sec => ({ start: sec.addr, end: sec.addr + sec.size }));
};
