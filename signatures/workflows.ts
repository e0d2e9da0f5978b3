"use strict";

import type { AnalysisBackend } from "../backend/types.js";
import { generateSignatures } from "./generate.js";
import type { GenerateReport } from "./generate.js";
import { matchSignatures } from "./match.js";
import type { MatchPass } from "./match.js";
import { applyMatches } from "./rename.js";
import type { RenameResult } from "./rename.js";
import { DEFAULT_SIGNATURE_FILE, loadSignatureFile, saveSignatureFile } from "./signature-file.js";
import { summarizeStore } from "./store.js";
import type { SignatureStoreSummary } from "./store.js";
import type { SignatureCategoryName } from "./types.js";

export type SignatureWorkflowStage = "generating" | "saving" | "loading" | "matching" | "renaming" | "done";

export type SignatureWorkflowProgress = {
  stage: SignatureWorkflowStage;
  elapsedMs: number;
};

type WorkflowOptions = {
  path?: string;
  minStringLength?: number;
  now?: () => number;
  onProgress?: (progress: SignatureWorkflowProgress) => void;
};

export type BuildSignaturesOptions = WorkflowOptions;
export type ApplySignaturesOptions = WorkflowOptions;

export type BuildSignaturesReport = {
  path: string;
  bytesWritten: number;
  generation: GenerateReport;
  elapsedMs: number;
};

export type MatchCounts = Record<SignatureCategoryName, number>;

export type ApplySignaturesReport = {
  path: string;
  generation: GenerateReport;
  external: SignatureStoreSummary;
  matches: MatchCounts;
  rename: RenameResult;
  elapsedMs: number;
};

const createStageReporter =
  (opts: WorkflowOptions, now: () => number, startedAt: number): ((stage: SignatureWorkflowStage) => void) =>
  (stage: SignatureWorkflowStage): void => {
    opts.onProgress?.({ stage, elapsedMs: now() - startedAt });
  };

const countMatches = (passes: MatchPass[]): MatchCounts => {
  const counts: MatchCounts = { formal: 0, strings: 0, immediates: 0, fuzzy: 0 };
  for (const pass of passes) counts[pass.category] = pass.matches.length;
  return counts;
};

/** Generates signatures for the loaded binary and writes them to `opts.path`. */
export async function buildSignatures(
  backend: AnalysisBackend,
  opts: BuildSignaturesOptions = {}
): Promise<BuildSignaturesReport> {
  const now = opts.now ?? Date.now;
  const startedAt = now();
  const path = opts.path ?? DEFAULT_SIGNATURE_FILE;
  const report = createStageReporter(opts, now, startedAt);

  report("generating");
  const { store, report: generation } = generateSignatures(backend, {
    now,
    ...(opts.minStringLength != null ? { minStringLength: opts.minStringLength } : {})
  });
  report("saving");
  const bytesWritten = await saveSignatureFile(store, path);
  report("done");
  return { path, bytesWritten, generation, elapsedMs: now() - startedAt };
}

/**
 * Generates signatures for the loaded binary, matches them against the file at `opts.path`
 * and renames placeholder-named functions. Renames already applied stay applied if a later
 * step fails.
 */
export async function applySignatures(
  backend: AnalysisBackend,
  opts: ApplySignaturesOptions = {}
): Promise<ApplySignaturesReport> {
  const now = opts.now ?? Date.now;
  const startedAt = now();
  const path = opts.path ?? DEFAULT_SIGNATURE_FILE;
  const report = createStageReporter(opts, now, startedAt);

  report("generating");
  const { store: local, report: generation } = generateSignatures(backend, {
    now,
    ...(opts.minStringLength != null ? { minStringLength: opts.minStringLength } : {})
  });
  report("loading");
  const external = await loadSignatureFile(path);
  report("matching");
  const passes = matchSignatures(local, external, { now });
  report("renaming");
  const rename = applyMatches(backend, passes, { now });
  report("done");
  return {
    path,
    generation,
    external: summarizeStore(external),
    matches: countMatches(passes),
    rename,
    elapsedMs: now() - startedAt
  };
}
