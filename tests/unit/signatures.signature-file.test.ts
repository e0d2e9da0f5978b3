"use strict";

import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { test } from "node:test";
import {
  SIGNATURE_FILE_MAGIC,
  SignatureFileError,
  deserializeSignatureStore,
  loadSignatureFile,
  saveSignatureFile,
  serializeSignatureStore,
  withSignatureExtension
} from "../../signatures/signature-file.js";
import { SignatureStoreBuilder, createEmptyStore } from "../../signatures/store.js";
import type { SignatureStore } from "../../signatures/types.js";

const createStore = (reverse = false): SignatureStore => {
  const builder = new SignatureStoreBuilder();
  const steps: Array<() => void> = [
    () => builder.formal.add(0xdeadbeef, 0x401000n),
    () => builder.formal.add(0x10, 0x401100n),
    () => builder.fuzzy.add(0x20, 0x401000n),
    () => builder.strings.add(0x30, 0x401100n),
    () => builder.immediates.add(0xffffffffffffffffn, 0x401000n),
    () =>
      builder.addFunction(0x401000n, {
        name: "chiffre_étape",
        blocks: [
          { formalHash: 1, fuzzyHash: 2, immediates: [0x12345n, 0x10000n], calledNames: ["memset", "strlen"] },
          { formalHash: 0xffffffff, fuzzyHash: 0, immediates: [], calledNames: [] }
        ]
      }),
    () => builder.addFunction(0x401100n, { name: "", blocks: [] })
  ];
  for (const step of reverse ? [...steps].reverse() : steps) step();
  return builder.build();
};

const withTempDir = async (run: (dir: string) => Promise<void>): Promise<void> => {
  const dir = await mkdtemp(join(tmpdir(), "blocksig-"));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

const toPlain = (store: SignatureStore) => ({
  formal: [...store.formal],
  fuzzy: [...store.fuzzy],
  strings: [...store.strings],
  immediates: [...store.immediates],
  functions: [...store.functions]
});

void test("serializeSignatureStore writes an empty store as a bare header", () => {
  const bytes = serializeSignatureStore(createEmptyStore());
  assert.deepEqual(
    [...bytes],
    [0x42, 0x53, 0x49, 0x47, 1, 0, 0, 0, ...new Array<number>(20).fill(0)]
  );
  assert.equal(new TextDecoder().decode(bytes.subarray(0, 4)), SIGNATURE_FILE_MAGIC);
});

void test("deserializeSignatureStore restores every category", () => {
  const store = createStore();
  assert.deepEqual(toPlain(deserializeSignatureStore(serializeSignatureStore(store))), toPlain(store));
});

void test("serializeSignatureStore output does not depend on insertion order", () => {
  assert.deepEqual(serializeSignatureStore(createStore(true)), serializeSignatureStore(createStore()));
});

void test("deserializeSignatureStore rejects a bad magic", () => {
  const bytes = serializeSignatureStore(createEmptyStore());
  bytes[0] = 0x58;
  assert.throws(() => deserializeSignatureStore(bytes), { name: "SignatureFileError", message: "Not a signature file (bad magic)." });
});

void test("deserializeSignatureStore rejects an unknown version", () => {
  const bytes = serializeSignatureStore(createEmptyStore());
  bytes[4] = 2;
  assert.throws(() => deserializeSignatureStore(bytes), { message: "Unsupported signature file version 2." });
});

void test("deserializeSignatureStore rejects truncated data", () => {
  const bytes = serializeSignatureStore(createStore());
  assert.throws(() => deserializeSignatureStore(bytes.subarray(0, bytes.length - 1)), SignatureFileError);
  assert.throws(() => deserializeSignatureStore(new Uint8Array([0x42, 0x53])), {
    message: "Signature data is truncated while reading magic at offset 0."
  });
});

void test("deserializeSignatureStore rejects trailing bytes", () => {
  const bytes = serializeSignatureStore(createEmptyStore());
  const padded = new Uint8Array(bytes.length + 1);
  padded.set(bytes);
  assert.throws(() => deserializeSignatureStore(padded), {
    message: "Signature data has 1 unexpected trailing byte(s)."
  });
});

void test("deserializeSignatureStore rejects counts larger than the data", () => {
  const bytes = serializeSignatureStore(createEmptyStore());
  new DataView(bytes.buffer, bytes.byteOffset).setUint32(8, 2, true);
  assert.throws(() => deserializeSignatureStore(bytes), {
    message: "formal signatures count 2 exceeds the remaining signature data."
  });
});

void test("deserializeSignatureStore rejects names that are not UTF-8", () => {
  const builder = new SignatureStoreBuilder();
  builder.addFunction(0x1000n, { name: "a", blocks: [] });
  const bytes = serializeSignatureStore(builder.build());
  assert.equal(bytes.length, 45);
  bytes[40] = 0xff;
  assert.throws(() => deserializeSignatureStore(bytes), { message: "function name is not valid UTF-8." });
});

void test("withSignatureExtension appends .sig only to file names without an extension", () => {
  assert.equal(withSignatureExtension("library"), "library.sig");
  assert.equal(withSignatureExtension(join("out.d", "library")), join("out.d", "library.sig"));
  assert.equal(withSignatureExtension("library.sig"), "library.sig");
  assert.equal(withSignatureExtension("library.v2"), "library.v2");
});

void test("saveSignatureFile and loadSignatureFile round-trip through disk", async () => {
  await withTempDir(async dir => {
    const path = join(dir, "lib.sig");
    const store = createStore();
    const written = await saveSignatureFile(store, path);
    assert.equal(written, (await readFile(path)).length);
    assert.deepEqual(toPlain(await loadSignatureFile(path)), toPlain(store));
  });
});

void test("loadSignatureFile reports the path of a missing file", async () => {
  await withTempDir(async dir => {
    const path = join(dir, "missing.sig");
    await assert.rejects(loadSignatureFile(path), (error: unknown) => {
      assert.ok(error instanceof SignatureFileError);
      assert.equal(error.path, path);
      assert.equal(error.message, `Failed to read signature file (${path})`);
      return true;
    });
  });
});

void test("loadSignatureFile adds the path to format errors", async () => {
  await withTempDir(async dir => {
    const path = join(dir, "garbage.sig");
    await writeFile(path, "not a signature file");
    await assert.rejects(loadSignatureFile(path), {
      name: "SignatureFileError",
      message: `Not a signature file (bad magic). (${path})`
    });
  });
});

void test("saveSignatureFile wraps write failures", async () => {
  await withTempDir(async dir => {
    const path = join(dir, "no-such-dir", "out.sig");
    await assert.rejects(saveSignatureFile(createEmptyStore(), path), {
      name: "SignatureFileError",
      message: `Failed to write signature file (${path})`
    });
  });
});
