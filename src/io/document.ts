import { extname } from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import type { Flow } from "../types/flow.js";
import type { StepKeyOptions } from "../stepkey/index.js";
import { diagnostic } from "../diagnostics/index.js";
import { SchemaError } from "../errors.js";
import { checkSchema } from "../validation/schema.js";

export type DocumentFormat = "yaml" | "json";

export function formatFromPath(path: string): DocumentFormat {
  return extname(path).toLowerCase() === ".json" ? "json" : "yaml";
}

/** Raw document for the validator; syntax errors surface as SCHEMA_INVALID. */
export function parseDocument(text: string, format: DocumentFormat): unknown {
  try {
    return format === "json" ? JSON.parse(text) : parseYaml(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new SchemaError(diagnostic("SCHEMA_INVALID", `document is not valid ${format.toUpperCase()}: ${reason}`));
  }
}

/** Parse and structurally check a flow document. */
export function loadFlow(text: string, format: DocumentFormat, opts: StepKeyOptions = {}): Flow {
  const schema = checkSchema(parseDocument(text, format), opts);
  if (!schema.ok) throw new SchemaError(schema.diagnostic);
  return schema.flow;
}

export function serializeFlow(flow: Flow, format: DocumentFormat): string {
  return format === "json" ? `${JSON.stringify(flow, null, 2)}\n` : stringifyYaml(flow);
}
