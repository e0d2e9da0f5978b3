"use strict";

import assert from "node:assert/strict";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { test } from "node:test";
import { SignatureFileError } from "../../signatures/signature-file.js";
import { applySignatures, buildSignatures } from "../../signatures/workflows.js";
import type { SignatureWorkflowStage } from "../../signatures/workflows.js";
import type { ListingBackend } from "../../backend/listing-backend.js";
import { block, createListingBackend, createSampleProgram, fn, insn, reg, ret } from "../helpers/listing-builder.js";

const withTempDir = async (run: (dir: string) => Promise<void>): Promise<void> => {
  const dir = await mkdtemp(join(tmpdir(), "blocksig-workflow-"));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

void test("buildSignatures writes the store and reports its stages", async () => {
  await withTempDir(async dir => {
    const path = join(dir, "sample.sig");
    const stages: SignatureWorkflowStage[] = [];
    const report = await buildSignatures(createSampleProgram(), { path, onProgress: progress => stages.push(progress.stage) });
    assert.equal(report.path, path);
    assert.ok(report.bytesWritten > 28);
    assert.equal(report.generation.functions, 3);
    assert.deepEqual(stages, ["generating", "saving", "done"]);
  });
});

void test("applySignatures restores the names of a stripped copy", async () => {
  await withTempDir(async dir => {
    const path = join(dir, "sample.sig");
    await buildSignatures(createSampleProgram(), { path });

    const stripped = createSampleProgram({ stripped: true });
    const stages: SignatureWorkflowStage[] = [];
    const report = await applySignatures(stripped, { path, onProgress: progress => stages.push(progress.stage) });

    assert.deepEqual(stages, ["generating", "loading", "matching", "renaming", "done"]);
    assert.deepEqual(report.matches, { formal: 3, strings: 1, immediates: 1, fuzzy: 3 });
    assert.deepEqual(report.external, { formal: 3, fuzzy: 3, strings: 1, immediates: 1, functions: 3 });
    assert.equal(report.rename.renamed, 2);
    assert.deepEqual(
      [...report.rename.records]
        .sort((a, b) => (a.address < b.address ? -1 : 1))
        .map(record => [record.address, record.previousName, record.name, record.category]),
      [
        [0x1100n, "sub_1100", "beta", "formal"],
        [0x1200n, "sub_1200", "gamma", "formal"]
      ]
    );
    assert.deepEqual(stripped.functionNames(), [
      { address: 0x1000n, name: "alpha" },
      { address: 0x1100n, name: "beta" },
      { address: 0x1200n, name: "gamma" }
    ]);
    assert.equal(stripped.isLibraryFunction(0x1100n), true);
    assert.equal(stripped.isLibraryFunction(0x1000n), false);
  });
});

void test("applySignatures leaves a fully named program alone", async () => {
  await withTempDir(async dir => {
    const path = join(dir, "sample.sig");
    await buildSignatures(createSampleProgram(), { path });
    const report = await applySignatures(createSampleProgram(), { path });
    assert.equal(report.rename.renamed, 0);
    assert.equal(report.matches.formal, 3);
  });
});

void test("applySignatures matches a copy loaded at another address", async () => {
  await withTempDir(async dir => {
    const path = join(dir, "sample.sig");
    await buildSignatures(createSampleProgram(), { path });
    const moved = createSampleProgram({ stripped: true, base: 0x7000n });
    const report = await applySignatures(moved, { path });
    assert.equal(report.rename.renamed, 2);
    assert.equal(moved.nameAt(0x7100n), "beta");
    assert.equal(moved.nameAt(0x7200n), "gamma");
  });
});

void test("applySignatures fails without renaming anything when the file is missing", async () => {
  await withTempDir(async dir => {
    const stripped = createSampleProgram({ stripped: true });
    await assert.rejects(applySignatures(stripped, { path: join(dir, "missing.sig") }), SignatureFileError);
    assert.equal(stripped.nameAt(0x1100n), "sub_1100");
  });
});

void test("buildSignatures writes the same bytes for the same program", async () => {
  await withTempDir(async dir => {
    const first = join(dir, "first.sig");
    const second = join(dir, "second.sig");
    await buildSignatures(createSampleProgram(), { path: first });
    await buildSignatures(createSampleProgram(), { path: second });
    assert.deepEqual(await readFile(second), await readFile(first));
  });
});

// foo only loads a long string; the stripped copy adds a prologue, so only the string still matches.
const createStringProgram = (stripped: boolean): ListingBackend => {
  const marker = { address: 0x9000n, text: "unique_marker_string" };
  const load = (address: bigint) =>
    insn(address, "lea", { operands: [reg("rax"), reg("[msg]")], dataRefs: [marker.address] });
  return stripped
    ? createListingBackend({
        functions: [fn(0x1000n, block(insn(0x1000n, "push", { operands: [reg("rbp")] }), load(0x1001n), ret(0x1002n)))],
        strings: [{ ...marker, referencingAddresses: [0x1001n] }]
      })
    : createListingBackend({
        functions: [fn(0x1000n, block(load(0x1000n), ret(0x1001n)))],
        names: [[0x1000n, "foo"]],
        strings: [{ ...marker, referencingAddresses: [0x1000n] }]
      });
};

void test("applySignatures renames a function by its unique string when its code differs", async () => {
  await withTempDir(async dir => {
    const path = join(dir, "strings.sig");
    await buildSignatures(createStringProgram(false), { path });
    const stripped = createStringProgram(true);
    const report = await applySignatures(stripped, { path });
    assert.deepEqual(report.matches, { formal: 0, strings: 1, immediates: 0, fuzzy: 1 });
    assert.equal(report.rename.renamed, 1);
    assert.deepEqual(
      report.rename.records.map(record => [record.address, record.previousName, record.name, record.category]),
      [[0x1000n, "sub_1000", "foo", "strings"]]
    );
    assert.equal(stripped.nameAt(0x1000n), "foo");
  });
});

const createTwinProgram = (stripped: boolean): ListingBackend => {
  const body = (start: bigint) =>
    fn(start, block(insn(start, "xor", { operands: [reg("eax"), reg("eax")] }), ret(start + 1n)));
  return createListingBackend({
    functions: [body(0x1000n), body(0x2000n)],
    names: stripped
      ? []
      : [
          [0x1000n, "foo"],
          [0x2000n, "bar"]
        ]
  });
};

void test("applySignatures leaves identical functions unnamed", async () => {
  await withTempDir(async dir => {
    const path = join(dir, "twins.sig");
    await buildSignatures(createTwinProgram(false), { path });
    const stripped = createTwinProgram(true);
    const report = await applySignatures(stripped, { path });
    assert.deepEqual(report.matches, { formal: 0, strings: 0, immediates: 0, fuzzy: 0 });
    assert.equal(report.rename.renamed, 0);
    assert.deepEqual(stripped.functionNames(), [
      { address: 0x1000n, name: "sub_1000" },
      { address: 0x2000n, name: "sub_2000" }
    ]);
  });
});
