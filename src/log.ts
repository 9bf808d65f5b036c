import type { Diagnostic } from "./types/diagnostics.js";
import { formatDiagnostic } from "./diagnostics/index.js";

export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
};

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export interface FlowLogger {
  /** Per-operation lines are wanted */
  readonly edits: boolean;
  line(msg: string): void;
  warn(msg: string): void;
}

export function createLogger(opts: { quiet?: boolean; logEdits?: boolean } = {}): FlowLogger {
  const quiet = opts.quiet ?? false;
  return {
    edits: !quiet && (opts.logEdits ?? true),
    line: msg => { if (!quiet) console.log(msg); },
    warn: msg => { if (!quiet) console.warn(msg); }
  };
}

export const silentLogger: FlowLogger = createLogger({ quiet: true });

export function colorDiagnostic(d: Diagnostic): string {
  const text = formatDiagnostic(d);
  if (d.severity === "ERROR") return COLOR.red(text);
  if (d.severity === "WARN") return COLOR.yellow(text);
  return COLOR.gray(text);
}
