/**
 * Centralized path definitions for Keelson.
 *
 * All runtime data is stored in KEELSON_HOME (defaults to ~/.keelson).
 * This can be overridden via the KEELSON_HOME environment variable.
 *
 * Directory structure:
 * ~/.keelson/
 * ├── config/           # User configuration files
 * │   └── runtime.json
 * ├── data/             # Runtime data
 * │   └── store/
 * │       └── memory.db
 * ├── workspace/        # Agent workspace
 * │   ├── STATE.md      # Persona state mirror
 * │   └── state/
 * │       └── memory_consolidation_state.json
 * └── .env              # Environment secrets
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Get the Keelson home directory.
 * Defaults to ~/.keelson, can be overridden via KEELSON_HOME env var.
 */
export function getKeelsonHome(): string {
  if (process.env.KEELSON_HOME) {
    return path.resolve(process.env.KEELSON_HOME);
  }
  return path.join(os.homedir(), '.keelson');
}

/**
 * Get the package root directory (where package.json lives).
 */
export function getPackageRoot(): string {
  let dir = __dirname;
  // dist/src/ when built, src/ when run from sources
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(__dirname, '..');
    dir = parent;
  }
  return dir;
}

export const KEELSON_HOME = getKeelsonHome();
export const PACKAGE_ROOT = getPackageRoot();

export const CONFIG_DIR = path.join(KEELSON_HOME, 'config');
export const DATA_DIR = path.join(KEELSON_HOME, 'data');
export const STORE_DIR = path.join(DATA_DIR, 'store');
export const WORKSPACE_DIR = path.join(KEELSON_HOME, 'workspace');

export const ENV_PATH = path.join(KEELSON_HOME, '.env');
export const RUNTIME_CONFIG_PATH = path.join(CONFIG_DIR, 'runtime.json');
export const MEMORY_DB_PATH = path.join(STORE_DIR, 'memory.db');

/**
 * Ensure the Keelson home directory structure exists.
 */
export function ensureDirectoryStructure(): void {
  for (const dir of [KEELSON_HOME, CONFIG_DIR, DATA_DIR, STORE_DIR, WORKSPACE_DIR]) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.chmodSync(KEELSON_HOME, 0o700);
  fs.chmodSync(CONFIG_DIR, 0o700);
  fs.chmodSync(DATA_DIR, 0o700);
}
