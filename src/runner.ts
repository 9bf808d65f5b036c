#!/usr/bin/env node
// src/runner.ts
// Command-line front end over the core:
//   validate <flow> [--actors f] [--actions f]
//   seq insert <flow> (--after K | --before K) --actor A --action B [--notes T]
//   seq renumber <flow> [--precision P] [--stride S]
//   apply <flow> --script edits.yaml
// Edits accept --dry-run and --no-backup. Registries default to
// registries/actors.yaml and registries/actions.yaml beside the flow file.
import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, type FlowConfig } from './config.js';
import { countBySeverity, hasErrors } from './diagnostics/index.js';
import { applyEditScript, FlowSession } from './edits/engine.js';
import { parseEditScript } from './edits/script.js';
import { keyOf, sectionTitle } from './flow/model.js';
import { formatFromPath, loadFlow, parseDocument, serializeFlow } from './io/document.js';
import { loadRegistries } from './io/registries.js';
import { COLOR, colorDiagnostic, createLogger } from './log.js';
import { validateDocument, type Registries } from './validation/index.js';
import type { EditScript } from './types/edits.js';

export type Flags = Record<string, string | true>;

const BOOLEAN_FLAGS = new Set(['dry-run', 'no-backup']);

export function parseArgs(argv: string[]): { positional: string[]; flags: Flags } {
  const out: { positional: string[]; flags: Flags } = { positional: [], flags: {} };
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith('--')) { out.positional.push(a); continue; }
    const eq = a.indexOf('=');
    if (eq > 0) { out.flags[a.slice(2, eq)] = a.slice(eq + 1); continue; }
    const name = a.slice(2);
    if (BOOLEAN_FLAGS.has(name)) { out.flags[name] = true; continue; }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) { out.flags[name] = next; i++; }
    else out.flags[name] = true;
  }
  return out;
}

function str(flags: Flags, name: string): string | undefined {
  const v = flags[name];
  return typeof v === 'string' ? v : undefined;
}

function num(flags: Flags, name: string, fallback: number): number {
  const v = str(flags, name);
  if (v === undefined) return fallback;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new Error(`--${name} expects an integer, got "${v}"`);
  return n;
}

function readRegistries(flowPath: string, flags: Flags): Registries {
  const dir = path.join(path.dirname(flowPath), 'registries');
  const actors = str(flags, 'actors') ?? path.join(dir, 'actors.yaml');
  const actions = str(flags, 'actions') ?? path.join(dir, 'actions.yaml');
  return loadRegistries(fs.readFileSync(actors, 'utf-8'), fs.readFileSync(actions, 'utf-8'));
}

export function cmdValidate(file: string, flags: Flags, cfg: FlowConfig): number {
  const text = fs.readFileSync(file, 'utf-8');
  const diags = validateDocument(parseDocument(text, formatFromPath(file)), readRegistries(file, flags), { minPrecision: cfg.minPrecision });
  for (const d of diags) console.log(colorDiagnostic(d));
  const c = countBySeverity(diags);
  console.log(COLOR.gray(`${c.ERROR} error(s), ${c.WARN} warning(s), ${c.INFO} info`));
  return hasErrors(diags) ? 1 : 0;
}

export function runScript(file: string, script: EditScript, flags: Flags, cfg: FlowConfig): number {
  const format = formatFromPath(file);
  const sourceText = fs.readFileSync(file, 'utf-8');
  const session = new FlowSession(loadFlow(sourceText, format, { minPrecision: cfg.minPrecision }), {
    registries: readRegistries(file, flags),
    minPrecision: cfg.minPrecision,
    validatePerOp: cfg.validatePerOp,
    logger: createLogger({ quiet: cfg.quiet, logEdits: cfg.logEdits })
  });
  const result = applyEditScript(session, script);
  for (const d of result.diagnostics) console.log(colorDiagnostic(d));
  if (result.status === 'rolled_back') {
    console.error(COLOR.red(`[rolled back] ${result.error.name}: ${result.error.message}`));
    return 1;
  }
  for (const id of result.inserted) {
    const major = keyOf(id)?.major;
    const title = major === undefined ? undefined : sectionTitle(result.flow, major);
    console.log(`${COLOR.green('+')} ${id}${title ? COLOR.gray(` (${title})`) : ''}`);
  }
  for (const c of result.changes) console.log(`${COLOR.yellow('~')} ${c.from} -> ${c.to ?? '(deleted)'}`);
  if (flags['dry-run']) {
    console.log(COLOR.gray('[dry-run] nothing written'));
    return 0;
  }
  if (!flags['no-backup']) {
    const ext = path.extname(file);
    fs.writeFileSync(`${file.slice(0, file.length - ext.length)}.bak${ext}`, sourceText, 'utf-8');
  }
  fs.writeFileSync(file, serializeFlow(result.flow, format), 'utf-8');
  return 0;
}

function cmdSeq(sub: string | undefined, file: string, flags: Flags, cfg: FlowConfig): number {
  if (sub === 'insert') {
    const after = str(flags, 'after');
    const before = str(flags, 'before');
    const target = after ?? before;
    if (!target) throw new Error('seq insert needs --after or --before');
    const step = {
      actor: str(flags, 'actor') ?? 'user',
      action: str(flags, 'action') ?? 'transform',
      inputs: [],
      outputs: [],
      notes: str(flags, 'notes') ?? 'New step'
    };
    return runScript(file, [after ? { op: 'insert_after', target, step } : { op: 'insert_before', target, step }], flags, cfg);
  }
  if (sub === 'renumber') {
    const precision = num(flags, 'precision', cfg.renumberPrecision);
    const stride = num(flags, 'stride', cfg.renumberStride);
    return runScript(file, [{ op: 'renumber_all', precision, stride }], flags, cfg);
  }
  throw new Error(`unknown seq command: ${sub ?? '(none)'}`);
}

function usage(): number {
  console.error([
    'usage:',
    '  procflow validate <flow> [--actors f] [--actions f]',
    '  procflow seq insert <flow> (--after K | --before K) [--actor A] [--action B] [--notes T]',
    '  procflow seq renumber <flow> [--precision P] [--stride S]',
    '  procflow apply <flow> --script edits.yaml',
    'edits accept --dry-run and --no-backup'
  ].join('\n'));
  return 2;
}

function main(): number {
  const { positional, flags } = parseArgs(process.argv);
  const cfg = loadConfig();
  const [cmd, ...rest] = positional;
  switch (cmd) {
    case 'validate':
      return rest[0] ? cmdValidate(rest[0], flags, cfg) : usage();
    case 'seq':
      return rest[1] ? cmdSeq(rest[0], rest[1], flags, cfg) : usage();
    case 'apply': {
      const script = str(flags, 'script');
      if (!rest[0] || !script) return usage();
      return runScript(rest[0], parseEditScript(fs.readFileSync(script, 'utf-8')), flags, cfg);
    }
    default:
      return usage();
  }
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  return path.basename(fs.realpathSync(entry)).replace(/\.[cm]?[jt]s$/, '') === 'runner';
}

if (invokedDirectly()) {
  try {
    process.exitCode = main();
  } catch (err) {
    console.error(COLOR.red('[fatal]'), err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
}
