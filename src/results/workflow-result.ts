import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { WorkflowResultSnapshotError, errorMessage } from "../core/errors.js";
import { decodeSnapshot, encodeSnapshot } from "./snapshot.js";
import { StepResult, type StepResultMapping } from "./step-result.js";

/**
 * Ordered, append-only ledger of every step result in a pipeline run.
 *
 * The binary snapshot and the YAML results file are two projections of this one
 * in-memory list; both are regenerated in full on every write.
 */
export class WorkflowResult {
  private readonly stepResults: StepResult[];

  constructor(stepResults: readonly StepResult[] = []) {
    this.stepResults = [...stepResults];
  }

  /** Reconstruct the ledger from a snapshot. A missing file yields an empty ledger. */
  static loadFromSnapshotFile(snapshotPath: string): WorkflowResult {
    if (!fs.existsSync(snapshotPath)) return new WorkflowResult();
    const entries = decodeSnapshot(fs.readFileSync(snapshotPath), snapshotPath);
    try {
      return new WorkflowResult(entries.map((data) => StepResult.fromData(data)));
    } catch (e) {
      throw new WorkflowResultSnapshotError(snapshotPath, errorMessage(e), { cause: e });
    }
  }

  get size(): number {
    return this.stepResults.length;
  }

  getStepResults(): readonly StepResult[] {
    return [...this.stepResults];
  }

  /** Append. Re-running a step appends a second entry; nothing is replaced. */
  addStepResult(stepResult: StepResult): void {
    this.stepResults.push(stepResult);
  }

  /** Overwrite the snapshot with the whole ledger. */
  writeToSnapshotFile(snapshotPath: string): void {
    fs.mkdirSync(path.dirname(snapshotPath), { recursive: true });
    fs.writeFileSync(snapshotPath, encodeSnapshot(this.stepResults.map((r) => r.toData())));
  }

  /** Overwrite the YAML results file with the merged projection of the ledger. */
  writeResultsToYmlFile(ymlPath: string): void {
    fs.mkdirSync(path.dirname(ymlPath), { recursive: true });
    fs.writeFileSync(ymlPath, YAML.stringify(this.toResultsMapping()), "utf8");
  }

  /**
   * Every result merged under one mapping keyed by step name, then sub-step name.
   * When a sub-step ran more than once, the later entry is what the file shows.
   */
  toResultsMapping(): StepResultMapping {
    const merged: StepResultMapping = {};
    for (const result of this.stepResults) {
      mergeInto(merged, result.getStepResult(), "overwrite");
    }
    return merged;
  }

  /**
   * Value of the first artifact named `artifact`, in ledger order.
   * `stepName` restricts the search to that step; `subStepName` further restricts it
   * and only applies together with `stepName`.
   */
  getArtifactValue(artifact: string, stepName?: string | null, subStepName?: string | null): unknown {
    for (const result of this.stepResults) {
      if (stepName !== null && stepName !== undefined) {
        if (result.stepName !== stepName) continue;
        if (subStepName !== null && subStepName !== undefined && result.subStepName !== subStepName) continue;
      }
      const found = result.getArtifact(artifact);
      if (found) return found.value;
    }
    return null;
  }

  /**
   * Nested mapping for `stepName`, merged across its sub-steps. The first entry for a
   * sub-step wins. Empty mapping when the step has not run.
   */
  getStepResult(stepName: string): StepResultMapping {
    const merged: StepResultMapping = {};
    for (const result of this.stepResults) {
      if (result.stepName !== stepName) continue;
      mergeInto(merged, result.getStepResult(), "keep-first");
    }
    return merged;
  }
}

function mergeInto(target: StepResultMapping, source: StepResultMapping, mode: "overwrite" | "keep-first"): void {
  for (const [stepName, subSteps] of Object.entries(source)) {
    const existing = (target[stepName] ??= {});
    for (const [subStepName, entry] of Object.entries(subSteps)) {
      if (mode === "keep-first" && Object.hasOwn(existing, subStepName)) continue;
      existing[subStepName] = entry;
    }
  }
}
