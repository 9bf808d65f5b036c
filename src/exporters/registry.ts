import type { Diagnostic } from "../types/diagnostics.js";
import type { Artifact, Exporter, ExporterRegistry } from "../types/exporters.js";
import type { Flow } from "../types/flow.js";
import { countBySeverity, errorsOf, formatDiagnostic } from "../diagnostics/index.js";
import { NotFoundError, OrchestrationError } from "../errors.js";
import { COLOR, silentLogger, type FlowLogger } from "../log.js";

export function buildExporterRegistry(exporters: readonly Exporter[]): ExporterRegistry {
  const reg = new Map<string, Exporter>();
  for (const e of exporters) {
    if (reg.has(e.format)) throw new OrchestrationError(`exporter for "${e.format}" registered twice`);
    reg.set(e.format, e);
  }
  return reg;
}

/**
 * Hand a committed flow to the exporter for `format`. ERROR diagnostics block
 * the export; WARNs are logged as caveats.
 */
export function exportFlow(
  registry: ExporterRegistry,
  format: string,
  flow: Flow,
  diagnostics: readonly Diagnostic[],
  log: FlowLogger = silentLogger
): Artifact {
  const errors = errorsOf(diagnostics);
  if (errors.length) {
    throw new OrchestrationError(`export blocked by ${errors.length} error(s): ${formatDiagnostic(errors[0])}`);
  }
  const exporter = registry.get(format);
  if (!exporter) throw new NotFoundError(`no exporter registered for "${format}"`);
  const { WARN } = countBySeverity(diagnostics);
  if (WARN) log.warn(COLOR.yellow(`exporting ${format} with ${WARN} warning(s)`));
  return exporter.export(flow);
}
