import v8 from "node:v8";
import { WorkflowResultSnapshotError, errorMessage } from "../core/errors.js";
import { validateWithSchema } from "../schema/ajv.js";
import { SNAPSHOT_FORMAT, SNAPSHOT_VERSION, WORKFLOW_RESULT_SNAPSHOT_SCHEMA } from "../schema/schemas.js";
import type { StepResultData } from "./step-result.js";

export type WorkflowResultSnapshot = {
  format: typeof SNAPSHOT_FORMAT;
  version: typeof SNAPSHOT_VERSION;
  written_at: string;
  results: StepResultData[];
};

/** Encode ledger entries into the binary snapshot format (V8 structured serialization). */
export function encodeSnapshot(results: StepResultData[], now: Date = new Date()): Buffer {
  const snapshot: WorkflowResultSnapshot = {
    format: SNAPSHOT_FORMAT,
    version: SNAPSHOT_VERSION,
    written_at: now.toISOString(),
    results,
  };
  return v8.serialize(snapshot);
}

function isSnapshot(value: unknown, valid: boolean): value is WorkflowResultSnapshot {
  return valid && typeof value === "object" && value !== null;
}

/** Decode and validate a binary snapshot. `filePath` is only used in error messages. */
export function decodeSnapshot(buffer: Buffer, filePath: string): StepResultData[] {
  let decoded: unknown;
  try {
    decoded = v8.deserialize(buffer);
  } catch (e) {
    throw new WorkflowResultSnapshotError(filePath, errorMessage(e), { cause: e });
  }

  const { valid, errors } = validateWithSchema("workflow-result-snapshot", WORKFLOW_RESULT_SNAPSHOT_SCHEMA, decoded);
  if (!isSnapshot(decoded, valid)) {
    throw new WorkflowResultSnapshotError(filePath, errors ?? "not a workflow result snapshot");
  }
  return decoded.results;
}
