import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { EXIT, exitCodeForError } from "../src/commands/exit-codes.js";
import { readResults } from "../src/commands/results.js";
import { parseStepConfigOverrides, runStep } from "../src/commands/run-step.js";
import { validateConfig } from "../src/commands/validate.js";
import { MemoryReporter } from "../src/logging/reporter.js";
import { WorkflowResult } from "../src/results/workflow-result.js";
import { StepResult } from "../src/results/step-result.js";
import { WORKFLOW_RESULT_SNAPSHOT_FILE_NAME } from "../src/step-implementer/step-implementer.js";

function tmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "supplyctl-cli-"));
}

function writePipeline(dir: string, body: string): string {
  const file = path.join(dir, "pipeline.yml");
  fs.writeFileSync(file, body);
  return file;
}

const LINT_ONLY = "tssc-config:\n  validate-environment-configuration:\n    implementer: ConfiglintFromArgocd\n";

describe("parseStepConfigOverrides", () => {
  it("splits on the first equals sign", () => {
    expect(parseStepConfigOverrides(["url=https://x.test/?a=b", "empty="])).toEqual({
      ok: true,
      overrides: { url: "https://x.test/?a=b", empty: "" },
    });
  });

  it("rejects pairs without a key", () => {
    expect(parseStepConfigOverrides(["=value"])).toEqual({
      ok: false,
      error: "Invalid step config override (expected key=value): =value",
    });
    expect(parseStepConfigOverrides(["novalue"]).ok).toBe(false);
  });
});

describe("exit codes", () => {
  it("maps error codes to exit codes", () => {
    expect(exitCodeForError("INVALID_ARGS")).toBe(EXIT.INVALID_ARGS);
    expect(exitCodeForError("CONFIG_DEFINITION_INVALID")).toBe(EXIT.CONFIG_INVALID);
    expect(exitCodeForError("STEP_CONFIG_MISSING_KEYS")).toBe(EXIT.CONFIG_INVALID);
    expect(exitCodeForError("UNKNOWN_STEP")).toBe(EXIT.CONFIG_INVALID);
    expect(exitCodeForError("STEP_EXECUTION_FAILED")).toBe(EXIT.FATAL);
    expect(exitCodeForError("SNAPSHOT_MISSING")).toBe(EXIT.FATAL);
  });
});

describe("run-step command", () => {
  it("runs a step and reports where the results went", async () => {
    const dir = tmpDir();
    const reporter = new MemoryReporter();
    const res = await runStep({
      step: "validate-environment-configuration",
      configPaths: [writePipeline(dir, LINT_ONLY)],
      resultsDir: path.join(dir, "results"),
      workDir: path.join(dir, "working"),
      reporter,
      env: {},
    });

    expect(res).toEqual({ ok: true, success: false, resultsFilePath: path.join(dir, "results", "tssc-results.yml") });
    const yml = YAML.parse(fs.readFileSync(path.join(dir, "results", "tssc-results.yml"), "utf8"));
    expect(yml["validate-environment-configuration"].ConfiglintFromArgocd.message).toBe(
      "Step results missing argocd-result-set from deploy step",
    );
    expect(reporter.codes()).toContain("STEP_FAILED");
  });

  it("passes step config overrides through", async () => {
    const dir = tmpDir();
    const res = await runStep({
      step: "validate-environment-configuration",
      configPaths: [writePipeline(dir, LINT_ONLY)],
      stepConfig: ["note=from-cli"],
      workDir: path.join(dir, "working"),
      resultsDir: path.join(dir, "results"),
      reporter: new MemoryReporter(),
      env: {},
    });
    expect(res.ok).toBe(true);
  });

  it("returns an error result for a bad override", async () => {
    const res = await runStep({ step: "x", configPaths: [], stepConfig: ["oops"], env: {} });
    expect(res).toEqual({
      ok: false,
      error: { code: "INVALID_ARGS", message: "Invalid step config override (expected key=value): oops" },
    });
  });

  it("returns an error result for an undefined step", async () => {
    const dir = tmpDir();
    const res = await runStep({
      step: "uat",
      configPaths: [writePipeline(dir, LINT_ONLY)],
      workDir: path.join(dir, "working"),
      resultsDir: path.join(dir, "results"),
      reporter: new MemoryReporter(),
      env: {},
    });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe("UNKNOWN_STEP");
  });

  it("returns an error result for an invalid pipeline", async () => {
    const dir = tmpDir();
    const res = await runStep({
      step: "deploy",
      configPaths: [writePipeline(dir, "steps: {}\n")],
      reporter: new MemoryReporter(),
      env: {},
    });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe("CONFIG_DEFINITION_INVALID");
  });
});

describe("validate command", () => {
  it("lists steps and sub-steps of a valid pipeline", () => {
    const dir = tmpDir();
    expect(validateConfig({ configPaths: [writePipeline(dir, LINT_ONLY)] })).toEqual({
      ok: true,
      steps: [
        {
          step: "validate-environment-configuration",
          subSteps: [{ name: "ConfiglintFromArgocd", implementer: "ConfiglintFromArgocd" }],
        },
      ],
    });
  });

  it("flags implementers the registry does not know", () => {
    const dir = tmpDir();
    const res = validateConfig({
      configPaths: [writePipeline(dir, "tssc-config:\n  deploy:\n    name: argo\n    implementer: ArgoCD\n")],
    });
    expect(res).toEqual({
      ok: false,
      errors: [
        {
          level: "error",
          code: "UNKNOWN_STEP_IMPLEMENTER",
          message: "Unknown step implementer ArgoCD for sub-step argo (known: ConfiglintFromArgocd)",
          step: "deploy",
        },
      ],
    });
  });

  it("reports a missing config path", () => {
    const missing = path.join(tmpDir(), "none.yml");
    expect(validateConfig({ configPaths: [missing] })).toEqual({
      ok: false,
      errors: [{ level: "error", code: "CONFIG_DEFINITION_INVALID", message: `Config path not found: ${missing}` }],
    });
  });
});

describe("results command", () => {
  it("projects the snapshot of a run", () => {
    const dir = tmpDir();
    const ledger = new WorkflowResult();
    const metadata = new StepResult("generate-metadata", "maven", "Maven");
    metadata.addArtifact("version", "1.0");
    ledger.addStepResult(metadata);
    ledger.addStepResult(new StepResult("tag-source", "git", "Git"));
    ledger.writeToSnapshotFile(path.join(dir, WORKFLOW_RESULT_SNAPSHOT_FILE_NAME));

    const all = readResults({ workDir: dir });
    expect(all.ok).toBe(true);
    if (!all.ok) return;
    expect(all.entries).toBe(2);
    expect(Object.keys(all.results)).toEqual(["generate-metadata", "tag-source"]);

    const one = readResults({ workDir: dir, step: "generate-metadata" });
    expect(one.ok).toBe(true);
    if (!one.ok) return;
    expect(one.results["generate-metadata"].maven.artifacts).toEqual({ version: { value: "1.0", type: "str" } });
    expect(Object.keys(one.results)).toEqual(["generate-metadata"]);
  });

  it("reports a missing snapshot", () => {
    const dir = tmpDir();
    expect(readResults({ workDir: dir })).toEqual({
      ok: false,
      error: {
        code: "SNAPSHOT_MISSING",
        message: `No workflow results found: ${path.join(dir, WORKFLOW_RESULT_SNAPSHOT_FILE_NAME)}`,
      },
    });
  });

  it("reports a corrupt snapshot", () => {
    const dir = tmpDir();
    fs.writeFileSync(path.join(dir, WORKFLOW_RESULT_SNAPSHOT_FILE_NAME), "garbage");
    const res = readResults({ workDir: dir });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe("SNAPSHOT_UNREADABLE");
  });
});
