"use strict";

import type { AnalysisBackend, BackendFunction, StringRecord } from "./types.js";

export type ListingString = {
  address: bigint;
  text: string;
  referencingAddresses: bigint[];
};

export type AddressRange = {
  start: bigint;
  end: bigint;
};

export type ProgramListing = {
  functions: BackendFunction[];
  strings: ListingString[];
  // Symbol names by address. Function starts missing here get a placeholder name.
  names: Map<bigint, string>;
  mappedRanges: AddressRange[];
  issues: string[];
};

type BlockInterval = {
  start: bigint;
  end: bigint;
  owner: bigint;
};

export const placeholderFunctionName = (address: bigint): string =>
  `sub_${address.toString(16).toUpperCase()}`;

const compareBigint = (a: bigint, b: bigint): number => (a < b ? -1 : a > b ? 1 : 0);

const isUsableName = (name: string): boolean => name.length > 0 && !/\s/.test(name);

/**
 * In-memory backend over a decoded program listing. Renames mutate only this object; the
 * listing it was built from is left untouched.
 */
export class ListingBackend implements AnalysisBackend {
  readonly issues: string[];
  private readonly functionsByStart = new Map<bigint, BackendFunction>();
  private readonly sortedStarts: bigint[];
  private readonly intervals: BlockInterval[];
  private readonly stringRecords: StringRecord[];
  private readonly namesByAddress = new Map<bigint, string>();
  private readonly addressesByName = new Map<string, bigint>();
  private readonly mappedRanges: AddressRange[];
  private readonly libraryFunctions = new Set<bigint>();

  constructor(listing: ProgramListing) {
    this.issues = [...listing.issues];
    for (const fn of listing.functions) {
      if (this.functionsByStart.has(fn.start)) {
        this.issues.push(`Duplicate function at 0x${fn.start.toString(16)} ignored.`);
        continue;
      }
      this.functionsByStart.set(fn.start, fn);
    }
    this.sortedStarts = [...this.functionsByStart.keys()].sort(compareBigint);
    this.intervals = this.sortedStarts
      .flatMap(start => {
        const fn = this.functionsByStart.get(start);
        return fn ? fn.blocks.map(block => ({ start: block.start, end: block.end, owner: start })) : [];
      })
      .sort((a, b) => compareBigint(a.start, b.start));
    this.stringRecords = listing.strings.map(entry => ({
      address: entry.address,
      text: entry.text,
      referencingAddresses: new Set(entry.referencingAddresses)
    }));
    for (const [address, name] of listing.names) this.assignName(address, name);
    for (const start of this.sortedStarts) {
      if (!this.namesByAddress.has(start)) this.assignName(start, placeholderFunctionName(start));
    }
    this.mappedRanges = listing.mappedRanges.filter(range => range.end > range.start);
  }

  private assignName(address: bigint, name: string): void {
    if (!isUsableName(name)) return;
    const owner = this.addressesByName.get(name);
    if (owner != null && owner !== address) {
      this.issues.push(`Name ${name} is already used at 0x${owner.toString(16)}; 0x${address.toString(16)} left unnamed.`);
      return;
    }
    const previous = this.namesByAddress.get(address);
    if (previous != null) this.addressesByName.delete(previous);
    this.namesByAddress.set(address, name);
    this.addressesByName.set(name, address);
  }

  functionAddresses(): bigint[] {
    return [...this.sortedStarts];
  }

  getFunction(address: bigint): BackendFunction | null {
    return this.functionsByStart.get(address) ?? null;
  }

  functionContaining(address: bigint): bigint | null {
    let low = 0;
    let high = this.intervals.length - 1;
    while (low <= high) {
      const middle = (low + high) >> 1;
      const interval = this.intervals[middle];
      if (!interval) break;
      if (address < interval.start) {
        high = middle - 1;
      } else if (address >= interval.end) {
        low = middle + 1;
      } else {
        return interval.owner;
      }
    }
    return null;
  }

  strings(): StringRecord[] {
    return this.stringRecords;
  }

  nameAt(address: bigint): string | null {
    return this.namesByAddress.get(address) ?? null;
  }

  addressOfName(name: string): bigint | null {
    return this.addressesByName.get(name) ?? null;
  }

  isFlaggedAddress(value: bigint): boolean {
    if (this.namesByAddress.has(value)) return true;
    return this.mappedRanges.some(range => value >= range.start && value < range.end);
  }

  setName(address: bigint, name: string): boolean {
    if (!isUsableName(name)) return false;
    const owner = this.addressesByName.get(name);
    if (owner != null && owner !== address) return false;
    this.assignName(address, name);
    return true;
  }

  markLibraryFunction(address: bigint): void {
    this.libraryFunctions.add(address);
  }

  isLibraryFunction(address: bigint): boolean {
    return this.libraryFunctions.has(address);
  }

  /** Function names in address order. */
  functionNames(): Array<{ address: bigint; name: string }> {
    return this.sortedStarts.map(address => ({ address, name: this.nameAt(address) ?? placeholderFunctionName(address) }));
  }
}
