"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { EM_X86_64, parseElf } from "../../analyzers/elf/index.js";
import { expectDefined } from "../helpers/expect-defined.js";
import { ELF_FIXTURE_BASE, buildElfFixture, createElfFixtureFile, layoutElfFixture } from "../fixtures/elf-program-file.js";

void test("parseElf reads the header, segments and named sections", async () => {
  const layout = layoutElfFixture(4);
  const parsed = expectDefined(await parseElf(createElfFixtureFile({ text: [0x90, 0x90, 0x90, 0xc3] })));
  assert.equal(parsed.is64, true);
  assert.equal(parsed.littleEndian, true);
  assert.equal(parsed.header.machine, EM_X86_64);
  assert.equal(parsed.header.type, 2);
  assert.equal(parsed.header.entry, layout.textAddr);
  assert.deepEqual(parsed.issues, []);
  assert.deepEqual(
    parsed.programHeaders.map(ph => [ph.type, ph.flags, ph.vaddr]),
    [[1, 5, ELF_FIXTURE_BASE]]
  );
  assert.deepEqual(
    parsed.sections.map(section => section.name),
    ["", ".text", ".rodata", ".symtab", ".strtab", ".dynsym", ".dynstr", ".shstrtab"]
  );
  const text = expectDefined(parsed.sections[1]);
  assert.equal(text.addr, layout.textAddr);
  assert.equal(text.offset, BigInt(layout.textOffset));
  assert.equal(text.size, 4n);
});

void test("parseElf returns null for non-ELF data", async () => {
  assert.equal(await parseElf(new File([new Uint8Array(64)], "zeros.bin")), null);
  assert.equal(await parseElf(new File([new Uint8Array([0x7f, 0x45, 0x4c, 0x46])], "short.bin")), null);
});

void test("parseElf reports truncated section tables", async () => {
  const bytes = buildElfFixture({ text: [0xc3] });
  const parsed = expectDefined(await parseElf(new File([bytes.subarray(0, bytes.length - 32)], "cut.elf")));
  assert.ok(parsed.issues.includes("Section header table is truncated."));
  assert.equal(parsed.sections.length, 7);
});

void test("parseElf rejects entry sizes too small for the class", async () => {
  const bytes = buildElfFixture({ text: [0xc3] });
  new DataView(bytes.buffer).setUint16(0x3a, 16, true);
  const parsed = expectDefined(await parseElf(new File([bytes], "small.elf")));
  assert.deepEqual(parsed.sections, []);
  assert.ok(parsed.issues.includes("Section header table entry size 16 is smaller than 64 bytes."));
});
