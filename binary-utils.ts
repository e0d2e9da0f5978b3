"use strict";

export const toHex64 = (value: bigint | number): string => "0x" + value.toString(16);

export const formatElapsedMs = (elapsedMs: number): string => `${(elapsedMs / 1000).toFixed(2)}s`;

/** Converts a file offset or size to a number, or records an issue when it cannot index a file. */
export const toSafeIndex = (value: bigint, label: string, issues: string[]): number | null => {
  const num = Number(value);
  if (!Number.isSafeInteger(num) || num < 0) {
    issues.push(`${label} (${value.toString()}) is too large to index into the file.`);
    return null;
  }
  return num;
};

export const readAsciiString = (dataView: DataView, offset: number, maxLength: number): string => {
  let result = "";
  for (let index = 0; index < maxLength && offset + index < dataView.byteLength; index += 1) {
    const codePoint = dataView.getUint8(offset + index);
    if (codePoint === 0) break;
    result += String.fromCharCode(codePoint);
  }
  return result;
};

export const isPrintableByte = (byteValue: number): boolean =>
  byteValue >= 0x20 && byteValue <= 0x7e;

const isStringByte = (byteValue: number): boolean =>
  isPrintableByte(byteValue) || byteValue === 0x09 || byteValue === 0x0a || byteValue === 0x0d;

export type TerminatedString = {
  offset: number;
  text: string;
};

/**
 * NUL-terminated runs of printable ASCII (tab, CR and LF included) of at least
 * `minimumLength` characters. Runs that reach the end of `bytes` without a terminator are
 * not strings.
 */
export const collectTerminatedStrings = (bytes: Uint8Array, minimumLength: number): TerminatedString[] => {
  const out: TerminatedString[] = [];
  let start = 0;
  let current = "";
  for (let index = 0; index < bytes.length; index += 1) {
    const byteValue = bytes[index] ?? 0;
    if (byteValue === 0) {
      if (current.length >= minimumLength) out.push({ offset: start, text: current });
      current = "";
      start = index + 1;
    } else if (isStringByte(byteValue)) {
      current += String.fromCharCode(byteValue);
    } else {
      current = "";
      start = index + 1;
    }
  }
  return out;
};
