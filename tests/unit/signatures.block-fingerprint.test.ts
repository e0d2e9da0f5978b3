"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import type { StringRecord } from "../../backend/types.js";
import { MIN_INTERESTING_IMMEDIATE, fingerprintBlock } from "../../signatures/block-fingerprint.js";
import type { BlockFingerprintContext } from "../../signatures/block-fingerprint.js";
import { signatureHash } from "../../signatures/hash.js";
import { block, call, imm, insn, reg, ret } from "../helpers/listing-builder.js";

const createContext = (opts: {
  names?: Array<[bigint, string]>;
  flagged?: bigint[];
  strings?: StringRecord[];
} = {}): BlockFingerprintContext => {
  const names = new Map(opts.names ?? []);
  const flagged = new Set(opts.flagged ?? []);
  return {
    backend: {
      nameAt: address => names.get(address) ?? null,
      isFlaggedAddress: value => flagged.has(value)
    },
    stringsByAddress: new Map((opts.strings ?? []).map(record => [record.address, record]))
  };
};

void test("fingerprintBlock hashes operand text and keeps large immediates", () => {
  const signature = fingerprintBlock(
    block(insn(0x10n, "mov", { operands: [reg("eax"), imm(0x12345n)] }), ret(0x11n)),
    createContext()
  );
  assert.equal(signature.formalHash, signatureHash("moveax0x12345ret"));
  assert.equal(signature.fuzzyHash, signatureHash("74565"));
  assert.deepEqual(signature.immediates, [0x12345n]);
  assert.deepEqual(signature.calledNames, []);
});

void test("fingerprintBlock ignores immediates below the threshold, negative ones and flagged addresses", () => {
  const signature = fingerprintBlock(
    block(
      insn(0x10n, "mov", { operands: [reg("eax"), imm(MIN_INTERESTING_IMMEDIATE - 1n)] }),
      insn(0x11n, "mov", { operands: [reg("ecx"), imm(MIN_INTERESTING_IMMEDIATE)] }),
      insn(0x12n, "mov", { operands: [reg("edx"), imm(0xfffffff0n, "-0x10")] }),
      insn(0x13n, "mov", { operands: [reg("ebx"), imm(0x401000n)] })
    ),
    createContext({ flagged: [0x401000n] })
  );
  assert.deepEqual(signature.immediates, [0xffffn]);
  assert.equal(signature.fuzzyHash, signatureHash("65535"));
  assert.equal(signature.formalHash, signatureHash("moveax0xFFFEmovecx0xFFFFmovedx-0x10movebx0x401000"));
});

void test("fingerprintBlock records named call targets but not their operands", () => {
  const signature = fingerprintBlock(
    block(call(0x10n, 0x500n), call(0x11n, 0x600n)),
    createContext({ names: [[0x500n, "memcpy"]] })
  );
  assert.equal(signature.formalHash, signatureHash("callcall"));
  assert.equal(signature.fuzzyHash, signatureHash("funcref"));
  assert.deepEqual(signature.calledNames, ["memcpy"]);
});

void test("fingerprintBlock uses string text for string references and a marker for other data", () => {
  const signature = fingerprintBlock(
    block(
      insn(0x10n, "lea", { operands: [reg("rdi"), reg("[rip+0x100]")], dataRefs: [0x9000n] }),
      insn(0x11n, "mov", { operands: [reg("rax"), reg("[rip+0x200]")], dataRefs: [0x9100n] })
    ),
    createContext({ strings: [{ address: 0x9000n, text: "usage: %s", referencingAddresses: new Set([0x10n]) }] })
  );
  assert.equal(signature.formalHash, signatureHash("leausage: %smovdataref"));
  assert.equal(signature.fuzzyHash, signatureHash("usage: %sdataref"));
});

void test("fingerprintBlock keeps only the mnemonic of branches", () => {
  const signature = fingerprintBlock(
    block(insn(0x10n, "cmp", { operands: [reg("eax"), reg("ecx")] }), insn(0x11n, "jne", { codeRefs: [0x40n], operands: [reg("0x40")] })),
    createContext()
  );
  assert.equal(signature.formalHash, signatureHash("cmpeaxecxjne"));
  assert.equal(signature.fuzzyHash, signatureHash(""));
});

void test("fingerprintBlock walks instructions in address order", () => {
  const ordered = fingerprintBlock(block(insn(0x10n, "push"), insn(0x11n, "pop")), createContext());
  const shuffled = fingerprintBlock(
    { start: 0x10n, end: 0x12n, instructions: [insn(0x11n, "pop"), insn(0x10n, "push")] },
    createContext()
  );
  assert.deepEqual(shuffled, ordered);
});
