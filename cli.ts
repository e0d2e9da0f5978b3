"use strict";

import { readFile, writeFile } from "node:fs/promises";
import { basename } from "node:path";
import { parseArgs } from "node:util";
import { openElfBackend } from "./backend/elf-backend.js";
import type { ElfListingOptions } from "./backend/elf-backend.js";
import type { ListingBackend } from "./backend/listing-backend.js";
import { formatElapsedMs, toHex64 } from "./binary-utils.js";
import { DEFAULT_SIGNATURE_FILE, withSignatureExtension } from "./signatures/signature-file.js";
import { applySignatures, buildSignatures } from "./signatures/workflows.js";
import type { SignatureWorkflowProgress } from "./signatures/workflows.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = [
  "Usage:",
  "  blocksig build <binary> [-o <file>] [--min-string-length <n>] [--verbose]",
  "  blocksig apply <binary> [<file>] [--map <out>] [--min-string-length <n>] [--verbose]",
  "",
  `The signature file defaults to ${DEFAULT_SIGNATURE_FILE}.`
].join("\n");

export type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  openBackend?: (file: File, opts: ElfListingOptions) => Promise<ListingBackend>;
};

class UsageError extends Error {}

const parseMinStringLength = (value: string | undefined): number | undefined => {
  if (value == null) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) throw new UsageError(`Invalid --min-string-length: ${value}`);
  return parsed;
};

const loadBinary = async (path: string): Promise<File> => {
  const bytes = await readFile(path);
  return new File([new Uint8Array(bytes)], basename(path));
};

const formatSymbolMap = (backend: ListingBackend): string =>
  backend
    .functionNames()
    .map(entry => `${toHex64(entry.address)} ${entry.name}\n`)
    .join("");

const progressPrinter =
  (io: CliIo, verbose: boolean): ((progress: SignatureWorkflowProgress) => void) =>
  progress => {
    if (verbose) io.stderr(`[${formatElapsedMs(progress.elapsedMs)}] ${progress.stage}`);
  };

const parseCommandLine = (args: string[]) =>
  parseArgs({
    args,
    allowPositionals: true,
    options: {
      output: { type: "string", short: "o" },
      map: { type: "string" },
      "min-string-length": { type: "string" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false }
    }
  });

/** Runs one command line invocation and returns its exit code. */
export async function runCli(args: string[], io: CliIo): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(args);
  } catch (error) {
    io.stderr(error instanceof Error ? error.message : String(error));
    io.stderr(USAGE);
    return EXIT_USAGE;
  }
  const { values, positionals } = parsed;
  if (values.help) {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  const [command, binaryPath, signaturePath, ...extra] = positionals;
  let minStringLength: number | undefined;
  try {
    minStringLength = parseMinStringLength(values["min-string-length"]);
    if (command !== "build" && command !== "apply") throw new UsageError(`Unknown command: ${command ?? "(none)"}`);
    if (binaryPath == null) throw new UsageError("Missing <binary> argument.");
    if (extra.length > 0 || (command === "build" && signaturePath != null)) {
      throw new UsageError(`Unexpected argument: ${extra[0] ?? signaturePath ?? ""}`);
    }
    if (command === "build" && values.map != null) throw new UsageError("--map only applies to apply.");
    if (command === "apply" && values.output != null) throw new UsageError("-o only applies to build.");
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.stderr(error.message);
    io.stderr(USAGE);
    return EXIT_USAGE;
  }

  const verbose = values.verbose ?? false;
  const openBackend = io.openBackend ?? openElfBackend;
  const onProgress = progressPrinter(io, verbose);
  const options = minStringLength != null ? { minStringLength } : {};
  try {
    const backend = await openBackend(await loadBinary(binaryPath), {});
    for (const issue of backend.issues) io.stderr(`warning: ${issue}`);

    if (command === "build") {
      const report = await buildSignatures(backend, {
        ...options,
        path: values.output != null ? withSignatureExtension(values.output) : DEFAULT_SIGNATURE_FILE,
        onProgress
      });
      const { generation } = report;
      io.stdout(
        `Wrote ${report.path} (${report.bytesWritten} bytes): ${generation.functions} functions, ` +
          `${generation.formal} formal, ${generation.fuzzy} fuzzy, ${generation.strings} strings, ` +
          `${generation.immediates} immediates in ${formatElapsedMs(report.elapsedMs)}.`
      );
      return EXIT_OK;
    }

    const report = await applySignatures(backend, {
      ...options,
      path: signaturePath ?? DEFAULT_SIGNATURE_FILE,
      onProgress
    });
    for (const record of report.rename.records) {
      io.stdout(`${toHex64(record.address)} ${record.previousName} -> ${record.name}`);
    }
    const { matches } = report;
    io.stdout(
      `Matched ${matches.formal} formal, ${matches.strings} strings, ${matches.immediates} immediates, ` +
        `${matches.fuzzy} fuzzy; renamed ${report.rename.renamed} functions in ${formatElapsedMs(report.elapsedMs)}.`
    );
    if (values.map != null) {
      await writeFile(values.map, formatSymbolMap(backend));
      io.stdout(`Wrote symbol map to ${values.map}.`);
    }
    return EXIT_OK;
  } catch (error) {
    io.stderr(error instanceof Error ? error.message : String(error));
    return EXIT_FAILURE;
  }
}
