"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { parseElf } from "../../analyzers/elf/index.js";
import { STT_FUNC, STT_GNU_IFUNC, STT_OBJECT, isFunctionSymbolType, parseElfSymbols } from "../../analyzers/elf/symbols.js";
import type { ElfFixtureOptions } from "../fixtures/elf-program-file.js";
import { createElfFixtureFile, layoutElfFixture } from "../fixtures/elf-program-file.js";
import { expectDefined } from "../helpers/expect-defined.js";

const readSymbols = async (opts: ElfFixtureOptions) => {
  const file = createElfFixtureFile(opts);
  const elf = expectDefined(await parseElf(file));
  const issues: string[] = [];
  const symbols = await parseElfSymbols({
    file,
    sections: elf.sections,
    is64: elf.is64,
    littleEndian: elf.littleEndian,
    issues
  });
  return { symbols, issues };
};

void test("isFunctionSymbolType accepts functions and indirect functions", () => {
  assert.equal(isFunctionSymbolType(STT_FUNC), true);
  assert.equal(isFunctionSymbolType(STT_GNU_IFUNC), true);
  assert.equal(isFunctionSymbolType(STT_OBJECT), false);
});

void test("parseElfSymbols reads .symtab before .dynsym", async () => {
  const { textAddr, rodataAddr } = layoutElfFixture(16);
  const { symbols, issues } = await readSymbols({
    text: new Array<number>(16).fill(0x90),
    rodata: [1, 2, 3, 4],
    symbols: [
      { name: "main", value: textAddr, size: 8n },
      { name: "table", value: rodataAddr, size: 4n, type: STT_OBJECT, shndx: 2 }
    ],
    dynamicSymbols: [{ name: "exported", value: textAddr + 8n, size: 8n }]
  });
  assert.deepEqual(issues, []);
  assert.deepEqual(
    symbols.map(symbol => [symbol.name, symbol.value, symbol.size, symbol.type, symbol.source]),
    [
      ["main", textAddr, 8n, STT_FUNC, ".symtab"],
      ["table", rodataAddr, 4n, STT_OBJECT, ".symtab"],
      ["exported", textAddr + 8n, 8n, STT_FUNC, ".dynsym"]
    ]
  );
});

void test("parseElfSymbols skips imports, absolute symbols, sections and unnamed entries", async () => {
  const { textAddr } = layoutElfFixture(4);
  const { symbols } = await readSymbols({
    text: [0x90, 0x90, 0x90, 0xc3],
    symbols: [
      { name: "puts", value: 0n, shndx: 0 },
      { name: "abs_value", value: 0x1234n, shndx: 0xfff1 },
      { name: ".text", value: textAddr, type: 3 },
      { name: "", value: textAddr },
      { name: "start", value: textAddr, type: 0 }
    ]
  });
  assert.deepEqual(
    symbols.map(symbol => symbol.name),
    ["start"]
  );
});
