import fs from "node:fs";
import path from "node:path";
import { SupplyctlError } from "../core/errors.js";
import type { StepResultMapping } from "../results/step-result.js";
import { WorkflowResult } from "../results/workflow-result.js";
import { WORKFLOW_RESULT_SNAPSHOT_FILE_NAME } from "../step-implementer/step-implementer.js";

export type ResultsResult =
  | { ok: true; entries: number; results: StepResultMapping }
  | { ok: false; error: { code: string; message: string } };

/**
 * Read the ledger snapshot of a run and project it, optionally for a single step.
 */
export function readResults(opts: { workDir: string; step?: string }): ResultsResult {
  const snapshotPath = path.join(opts.workDir, WORKFLOW_RESULT_SNAPSHOT_FILE_NAME);
  if (!fs.existsSync(snapshotPath)) {
    return { ok: false, error: { code: "SNAPSHOT_MISSING", message: `No workflow results found: ${snapshotPath}` } };
  }

  try {
    const ledger = WorkflowResult.loadFromSnapshotFile(snapshotPath);
    return {
      ok: true,
      entries: ledger.size,
      results: opts.step ? ledger.getStepResult(opts.step) : ledger.toResultsMapping(),
    };
  } catch (e) {
    if (e instanceof SupplyctlError) return { ok: false, error: { code: e.code, message: e.message } };
    throw e;
  }
}
