#!/usr/bin/env node

import { Command } from "commander";
import YAML from "yaml";
import { EXIT, exitCodeForError } from "./commands/exit-codes.js";
import { readResults } from "./commands/results.js";
import { runStep } from "./commands/run-step.js";
import { validateConfig } from "./commands/validate.js";
import type { OutputFormat } from "./logging/reporter.js";

const program = new Command();

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseFormat(value: string): OutputFormat {
  if (value !== "human" && value !== "jsonl") {
    console.error(`Invalid --format: ${value} (expected human|jsonl)`);
    process.exit(EXIT.INVALID_ARGS);
  }
  return value;
}

function writeError(format: OutputFormat, error: { code: string; message: string }): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code: error.code, message: error.message }) + "\n");
  } else {
    console.error(error.message);
  }
}

program
  .name("supplyctl")
  .description("Supply-chain pipeline step runner")
  .version("0.1.0");

program
  .command("run-step")
  .description("Run every sub-step of one pipeline step and record its results")
  .requiredOption("--step <name>", "Step to run")
  .requiredOption("--config <path...>", "Pipeline definition files or directories")
  .option("--environment <name>", "Environment to resolve environment-specific config for")
  .option("--step-config <key=value>", "Runtime step config override (repeatable)", collect, [])
  .option("--results-dir <path>", "Directory for the results file")
  .option("--work-dir <path>", "Working directory (holds the results snapshot)")
  .option("--format <format>", "Output format: human|jsonl")
  .action(
    async (opts: {
      step: string;
      config: string[];
      environment?: string;
      stepConfig: string[];
      resultsDir?: string;
      workDir?: string;
      format?: string;
    }) => {
      const format = opts.format ? parseFormat(opts.format) : undefined;
      const res = await runStep({
        step: opts.step,
        configPaths: opts.config,
        environment: opts.environment,
        stepConfig: opts.stepConfig,
        resultsDir: opts.resultsDir,
        workDir: opts.workDir,
        format,
      });

      if (!res.ok) {
        writeError(format ?? "human", res.error);
        process.exit(exitCodeForError(res.error.code));
      }

      process.exit(res.success ? EXIT.SUCCESS : EXIT.STEP_FAILED);
    },
  );

program
  .command("validate")
  .description("Validate a pipeline definition")
  .requiredOption("--config <path...>", "Pipeline definition files or directories")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action((opts: { config: string[]; format: string }) => {
    const format = parseFormat(opts.format);
    const res = validateConfig({ configPaths: opts.config });

    if (!res.ok) {
      if (format === "jsonl") {
        for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exit(EXIT.CONFIG_INVALID);
    }

    if (format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", steps: res.steps }) + "\n");
    } else {
      for (const step of res.steps) {
        console.log(`${step.step}: ${step.subSteps.map((s) => `${s.name} (${s.implementer})`).join(", ")}`);
      }
    }
  });

program
  .command("results")
  .description("Show recorded step results")
  .requiredOption("--work-dir <path>", "Working directory of the run")
  .option("--step <name>", "Only this step")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action((opts: { workDir: string; step?: string; format: string }) => {
    const format = parseFormat(opts.format);
    const res = readResults({ workDir: opts.workDir, step: opts.step });

    if (!res.ok) {
      writeError(format, res.error);
      process.exit(exitCodeForError(res.error.code));
    }

    if (format === "jsonl") {
      process.stdout.write(JSON.stringify(res.results) + "\n");
    } else {
      process.stdout.write(YAML.stringify(res.results));
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FATAL);
});
