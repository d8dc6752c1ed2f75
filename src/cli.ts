#!/usr/bin/env node

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';

import { errorMessage } from './errors.js';
import { SqliteMemory } from './memory-store.js';
import {
  ENV_PATH,
  KEELSON_HOME,
  MEMORY_DB_PATH,
  PACKAGE_ROOT,
  WORKSPACE_DIR,
  ensureDirectoryStructure
} from './paths.js';
import { BackendCanonicalStatePersistence } from './persona-state.js';
import { loadRuntimeConfig } from './runtime-config.js';
import type { RuntimeConfig } from './runtime-config.js';
import { applyHostConfig } from './session.js';
import { STATE_HEADER_SCHEMA_VERSION, immutableFieldsOf, stateHeaderToJson } from './state-header.js';
import type { StateHeader } from './state-header.js';
import { nowRfc3339 } from './timestamps.js';
import { VERIFY_REPAIR_ESCALATION_SLOT } from './write-policy.js';
import { validateWritebackPayload } from './writeback-guard.js';

const DEFAULT_ESCALATION_LIMIT = 20;

function log(message: string): void {
  console.log(`[keelson] ${message}`);
}

function error(message: string): void {
  console.error(`[keelson] ERROR: ${message}`);
}

type ParsedCliArgs = {
  command: string;
  args: string[];
  flags: {
    force: boolean;
    limit: number | undefined;
    objective: string | undefined;
    identityHash: string | undefined;
    safetyPosture: string | undefined;
  };
};

function parsePositiveInt(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs {
  let command = '';
  const args: string[] = [];
  const values = new Map<string, string>();
  let force = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--force') {
      force = true;
      continue;
    }
    if (arg.startsWith('--') && arg.includes('=')) {
      const eq = arg.indexOf('=');
      values.set(arg.slice(2, eq), arg.slice(eq + 1));
      continue;
    }
    if (arg.startsWith('--')) {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        values.set(arg.slice(2), next);
        i += 1;
      }
      continue;
    }
    if (!command) {
      command = arg;
      continue;
    }
    args.push(arg);
  }

  return {
    command: command || 'help',
    args,
    flags: {
      force,
      limit: parsePositiveInt(values.get('limit')),
      objective: values.get('objective'),
      identityHash: values.get('identity-hash'),
      safetyPosture: values.get('safety-posture')
    }
  };
}

function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(PACKAGE_ROOT, 'package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return 'unknown';
  } catch (err) {
    error(`cannot read package version: ${errorMessage(err)}`);
    return 'unknown';
  }
}

function openMemory(config: RuntimeConfig): SqliteMemory {
  return new SqliteMemory(config.memory.dbPath || MEMORY_DB_PATH);
}

function openPersistence(config: RuntimeConfig, memory: SqliteMemory): BackendCanonicalStatePersistence {
  const persona = config.persona;
  return new BackendCanonicalStatePersistence(
    memory,
    WORKSPACE_DIR,
    persona.personId,
    persona.mirrorFilename,
    persona.limits
  );
}

export function initialStateHeader(personId: string, flags: ParsedCliArgs['flags']): StateHeader {
  const identityHash = flags.identityHash
    ?? crypto.createHash('sha256').update(`persona:${personId}`).digest('hex');
  return {
    schemaVersion: STATE_HEADER_SCHEMA_VERSION,
    identityPrinciplesHash: identityHash,
    safetyPosture: flags.safetyPosture ?? 'strict',
    currentObjective: flags.objective ?? 'Assist the operator with the current task.',
    openLoops: [],
    nextActions: [],
    commitments: [],
    recentContextSummary: 'State header initialized.',
    lastUpdatedAt: nowRfc3339()
  };
}

async function cmdStateInit(config: RuntimeConfig, flags: ParsedCliArgs['flags']): Promise<number> {
  ensureDirectoryStructure();
  const memory = openMemory(config);
  try {
    const persistence = openPersistence(config, memory);
    const existing = await persistence.loadBackendCanonical();
    if (existing && !flags.force) {
      error('Canonical state header already exists. Use --force to replace it.');
      return 1;
    }
    await persistence.persistAndSync(initialStateHeader(config.persona.personId, flags));
    log(`Canonical state header written; mirror at ${persistence.mirrorPath()}`);
    return 0;
  } finally {
    memory.close();
  }
}

async function cmdStateShow(config: RuntimeConfig): Promise<number> {
  const memory = openMemory(config);
  try {
    const state = await openPersistence(config, memory).loadCanonical();
    if (!state) {
      log('No canonical state header. Run "keelson state init" first.');
      return 1;
    }
    console.log(JSON.stringify(stateHeaderToJson(state), null, 2));
    return 0;
  } finally {
    memory.close();
  }
}

async function cmdValidate(config: RuntimeConfig, file: string | undefined): Promise<number> {
  if (!file) {
    error('Usage: keelson validate <payload.json>');
    return 1;
  }
  const payload: unknown = JSON.parse(fs.readFileSync(path.resolve(file), 'utf-8'));
  const memory = openMemory(config);
  try {
    const state = await openPersistence(config, memory).loadBackendCanonical();
    if (!state) {
      error('No canonical state header to validate against. Run "keelson state init" first.');
      return 1;
    }
    const verdict = validateWritebackPayload(payload, immutableFieldsOf(state));
    if (verdict.status === 'rejected') {
      console.log(`REJECTED: ${verdict.reason}`);
      return 1;
    }
    console.log(`ACCEPTED: ${verdict.payload.memoryAppend.length} memory_append entries`);
    return 0;
  } finally {
    memory.close();
  }
}

async function cmdEscalations(config: RuntimeConfig, limit: number | undefined): Promise<number> {
  const memory = openMemory(config);
  try {
    const events = await memory.listEvents({
      slotKey: VERIFY_REPAIR_ESCALATION_SLOT,
      limit: limit ?? DEFAULT_ESCALATION_LIMIT
    });
    if (events.length === 0) {
      log('No verify/repair escalations recorded.');
      return 0;
    }
    for (const event of events) {
      console.log(`${event.occurredAt}  ${event.entityId}  ${event.value}`);
    }
    return 0;
  } finally {
    memory.close();
  }
}

function printHelp(): void {
  console.log(`
Keelson - turn control plane for autonomous agents

Usage: keelson <command> [options]

Commands:
  state init         Write the initial canonical persona state header
  state show         Print the canonical persona state header
  validate <file>    Run a writeback payload through the writeback guard
  escalations        List recorded verify/repair escalations
  version            Show version
  help               Show this help message

Options:
  --force                  Replace an existing state header (state init)
  --objective <text>       Initial current objective (state init)
  --identity-hash <hash>   Identity principles hash (state init)
  --safety-posture <text>  Safety posture (state init)
  --limit <n>              Maximum escalations to list

Data directory: ${KEELSON_HOME}
Override with KEELSON_HOME environment variable.
`);
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  const command = parsed.command;

  if (command === 'version' || command === '--version' || command === '-v') {
    console.log(`keelson ${getVersion()}`);
    return 0;
  }
  if (command === 'help' || command === '--help' || command === '-h') {
    printHelp();
    return 0;
  }

  try {
    const config = loadRuntimeConfig();
    applyHostConfig(config);
    switch (command) {
      case 'state': {
        const sub = parsed.args[0];
        if (sub === 'init') return await cmdStateInit(config, parsed.flags);
        if (sub === 'show') return await cmdStateShow(config);
        error(`Unknown state subcommand: ${sub ?? '(none)'}`);
        return 1;
      }
      case 'validate':
        return await cmdValidate(config, parsed.args[0]);
      case 'escalations':
        return await cmdEscalations(config, parsed.flags.limit);
      default:
        error(`Unknown command: ${command}`);
        printHelp();
        return 1;
    }
  } catch (err) {
    error(errorMessage(err));
    return 1;
  }
}

function isInvokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  // npm installs the bin as a symlink
  return fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(import.meta.url));
}

if (isInvokedDirectly()) {
  dotenv.config({ path: ENV_PATH });
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err) => {
      error(errorMessage(err));
      process.exitCode = 1;
    }
  );
}
