import type { Diagnostic, DiagnosticLocation, RuleName } from "./types/diagnostics.js";
import { diagnostic } from "./diagnostics/index.js";

type FlowErrorOptions = {
  location?: DiagnosticLocation;
  context?: Record<string, unknown>;
  cause?: unknown;
};

export class FlowError extends Error {
  readonly rule: RuleName;
  readonly location?: DiagnosticLocation;
  readonly context?: Record<string, unknown>;

  constructor(rule: RuleName, message: string, options: FlowErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "FlowError";
    this.rule = rule;
    this.location = options.location;
    this.context = options.context;
  }

  toDiagnostic(): Diagnostic {
    return diagnostic(this.rule, this.message, this.location);
  }
}

/** Malformed StepKey text. */
export class FormatError extends FlowError {
  constructor(message: string, options?: FlowErrorOptions) {
    super("FORMAT", message, options);
    this.name = "FormatError";
  }
}

/** No key fits strictly between two keys at the requested precision. */
export class AdjacentKeysError extends FlowError {
  constructor(message: string, options?: FlowErrorOptions) {
    super("ADJACENT_KEYS", message, options);
    this.name = "AdjacentKeysError";
  }
}

export class PrecisionLossError extends FlowError {
  constructor(message: string, options?: FlowErrorOptions) {
    super("PRECISION_LOSS", message, options);
    this.name = "PrecisionLossError";
  }
}

export class NotFoundError extends FlowError {
  constructor(message: string, options?: FlowErrorOptions) {
    super("NOT_FOUND", message, options);
    this.name = "NotFoundError";
  }
}

export class DuplicateKeyError extends FlowError {
  constructor(message: string, options?: FlowErrorOptions) {
    super("DUPLICATE_KEY", message, options);
    this.name = "DuplicateKeyError";
  }
}

export class AmbiguousRenumberError extends FlowError {
  constructor(message: string, options?: FlowErrorOptions) {
    super("AMBIGUOUS_RENUMBER", message, options);
    this.name = "AmbiguousRenumberError";
  }
}

export class OrchestrationError extends FlowError {
  constructor(message: string, options?: FlowErrorOptions) {
    super("ORCHESTRATION", message, options);
    this.name = "OrchestrationError";
  }
}

/** Phase-1 failure; carries the single SCHEMA_* diagnostic. */
export class SchemaError extends FlowError {
  readonly diagnostic: Diagnostic;

  constructor(d: Diagnostic) {
    super(d.rule, d.message, { location: d.location });
    this.name = "SchemaError";
    this.diagnostic = d;
  }

  override toDiagnostic(): Diagnostic {
    return this.diagnostic;
  }
}

/** Aggregated ERROR diagnostics from the semantic phase. */
export class ValidationError extends FlowError {
  readonly diagnostics: readonly Diagnostic[];

  constructor(diagnostics: readonly Diagnostic[]) {
    const first = diagnostics[0];
    const more = diagnostics.length > 1 ? ` (+${diagnostics.length - 1} more)` : "";
    super(first?.rule ?? "ORCHESTRATION", `${first?.message ?? "validation failed"}${more}`, { location: first?.location });
    this.name = "ValidationError";
    this.diagnostics = diagnostics;
  }

  override toDiagnostic(): Diagnostic {
    return this.diagnostics[0] ?? super.toDiagnostic();
  }
}

export function toDiagnostic(err: unknown): Diagnostic {
  if (err instanceof FlowError) return err.toDiagnostic();
  const message = err instanceof Error ? err.message : String(err);
  return diagnostic("ORCHESTRATION", message);
}

export function toFlowError(err: unknown): FlowError {
  if (err instanceof FlowError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new OrchestrationError(message, { cause: err });
}
