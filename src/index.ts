export type { Diagnostic, DiagnosticLocation, RuleName, Severity } from './types/diagnostics.js';
export type {
  Branch, Flow, Guard, KeyChange, KeyMapping, NewStep, ReferenceKind, Section, Step, StepId, StepReference, SubprocessCall
} from './types/flow.js';
export type { EditableField, EditOperation, EditResult, EditScript, TransactionState, Committed, RolledBack } from './types/edits.js';
export type { Artifact, Exporter, ExporterRegistry } from './types/exporters.js';

export * from './stepkey/index.js';
export * from './errors.js';
export { RULES, DIAGNOSTIC_CODE_PATTERN, diagnostic, hasErrors, errorsOf, countBySeverity, formatDiagnostic } from './diagnostics/index.js';
export {
  cloneFlow, collectReferences, findStep, freezeFlow, isTerminal, neighbours, referencesTo, sectionSteps, sectionTitle, sortSteps
} from './flow/model.js';
export { topoSort } from './flow/topo.js';
export { insertAfter, insertBefore, moveStep, rekeyStep, removeStep, renumber, applyMapping } from './flow/sequencer.js';
export { danglingTargets, mappingFromChanges, rewriteReferences } from './flow/references.js';
export { validateDocument, validateFlow, assertValid, checkSchema, isDefaultGuard, type Registries } from './validation/index.js';
export { FlowSession, Transaction, applyEditScript, type EngineOptions } from './edits/engine.js';
export { parseEditScript } from './edits/script.js';
export { formatFromPath, loadFlow, parseDocument, serializeFlow, type DocumentFormat } from './io/document.js';
export { loadRegistries, parseRegistry, registriesFrom } from './io/registries.js';
export { buildExporterRegistry, exportFlow } from './exporters/registry.js';
export { loadConfig, type FlowConfig } from './config.js';
export { createLogger, silentLogger, type FlowLogger } from './log.js';
