import YAML from "yaml";

export type OutputFormat = "human" | "jsonl";

export type DiagnosticLevel = "debug" | "info" | "warn" | "error";

export type Diagnostic = {
  level: DiagnosticLevel;
  code: string;
  message: string;
  step?: string;
  details?: Record<string, unknown>;
};

export type OutputStream = {
  write(chunk: string): unknown;
};

export interface Reporter {
  emit(diagnostic: Diagnostic): void;
}

const LEVEL_ORDER: Record<DiagnosticLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type ReporterOptions = {
  format: OutputFormat;
  minLevel?: DiagnosticLevel;
  stdout?: OutputStream;
  stderr?: OutputStream;
};

function indent(text: string, prefix: string): string {
  return text
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line) => prefix + line)
    .join("\n");
}

/** Render a diagnostic as one human-readable line, with details as indented YAML. */
export function formatHuman(d: Diagnostic): string {
  const scope = d.step ? `${d.step}: ` : "";
  let out = `${d.level.toUpperCase()} [${d.code}] ${scope}${d.message}\n`;
  if (d.details && Object.keys(d.details).length > 0) {
    out += indent(YAML.stringify(d.details), "    ") + "\n";
  }
  return out;
}

/**
 * Diagnostics reporter. `jsonl` writes one JSON object per line; `human` writes a
 * readable line. Errors go to stderr, everything else to stdout.
 */
export function createReporter(opts: ReporterOptions): Reporter {
  const stdout = opts.stdout ?? process.stdout;
  const stderr = opts.stderr ?? process.stderr;
  const minLevel = LEVEL_ORDER[opts.minLevel ?? "info"];

  return {
    emit(d: Diagnostic): void {
      if (LEVEL_ORDER[d.level] < minLevel) return;
      const line = opts.format === "jsonl" ? JSON.stringify(d) + "\n" : formatHuman(d);
      if (d.level === "error") {
        stderr.write(line);
      } else {
        stdout.write(line);
      }
    },
  };
}

export const silentReporter: Reporter = {
  emit(): void {},
};

/** Collects diagnostics in memory. */
export class MemoryReporter implements Reporter {
  readonly diagnostics: Diagnostic[] = [];

  emit(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  codes(): string[] {
    return this.diagnostics.map((d) => d.code);
  }
}
