import { copyFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { STATE_KEYS, StateEntry, StateKey } from '../types/index.js';
import { StateKeyNotFoundError } from '../errors/index.js';
import { Logger } from '../logging/logger.js';

const ANSI_ESCAPE = /\x1b\[[0-9;]*m/g;

const STATE_KEY_SET: ReadonlySet<string> = new Set(STATE_KEYS);

export function isStateKey(key: string): key is StateKey {
  return STATE_KEY_SET.has(key);
}

export function stripAnsi(value: string): string {
  return value.replace(ANSI_ESCAPE, '');
}

export interface StateStoreOptions {
  filePath: string;
  logger: Logger;
  /** Writes only log their intent */
  dryRun?: boolean;
}

interface StateLine {
  raw: string;
  key?: string;
  value?: string;
}

/**
 * Flat KEY=VALUE file holding the identifiers of created resources.
 * Keys are unique; writing a key replaces its previous line. Lines that are
 * not entries, or carry keys outside the known set, survive rewrites untouched.
 */
export class StateStore {
  readonly filePath: string;
  readonly dryRun: boolean;
  private readonly logger: Logger;

  constructor(options: StateStoreOptions) {
    this.filePath = options.filePath;
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger;
  }

  exists(): boolean {
    return existsSync(this.filePath);
  }

  /**
   * Create the file if missing. Returns true when it was created.
   */
  initialize(): boolean {
    if (this.exists() || this.dryRun) {
      return false;
    }
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, '');
    return true;
  }

  put(key: StateKey, value: string): void {
    if (/[\r\n]/.test(value)) {
      throw new Error(`State value for ${key} must be a single line`);
    }

    this.logger.debug(`Saving state: ${key}=${value}`);

    if (this.dryRun) {
      this.logger.info(`[DRY RUN] Would save state: ${key}=${value}`);
      return;
    }

    const lines = this.readLines();
    const kept = lines.filter(line => line.key !== key);
    if (kept.length !== lines.length) {
      this.logger.debug(`Removed existing entry for ${key}`);
    }
    kept.push({ raw: `${key}=${value}`, key, value });

    this.writeLines(kept);
    this.logger.info(`State saved: ${key}=${value}`);
  }

  get(key: StateKey): string {
    const value = this.find(key);
    if (value === undefined) {
      throw new StateKeyNotFoundError(key, this.filePath);
    }
    return value;
  }

  find(key: StateKey): string | undefined {
    let value: string | undefined;
    for (const line of this.readLines()) {
      if (line.key === key) {
        value = line.value;
      }
    }
    return value;
  }

  has(key: StateKey): boolean {
    return this.find(key) !== undefined;
  }

  remove(...keys: StateKey[]): void {
    if (keys.length === 0) {
      return;
    }

    if (this.dryRun) {
      this.logger.info(`[DRY RUN] Would remove state: ${keys.join(', ')}`);
      return;
    }

    if (!this.exists()) {
      return;
    }

    const targets = new Set<string>(keys);
    const lines = this.readLines();
    const kept = lines.filter(line => line.key === undefined || !targets.has(line.key));
    if (kept.length !== lines.length) {
      this.writeLines(kept);
      this.logger.debug(`Removed state: ${keys.join(', ')}`);
    }
  }

  clear(): void {
    if (this.dryRun) {
      this.logger.info('[DRY RUN] Would clear state file');
      return;
    }

    if (this.exists()) {
      writeFileSync(this.filePath, '');
      this.logger.info('State file cleared');
    }
  }

  snapshot(): StateEntry[] {
    const entries: StateEntry[] = [];
    for (const line of this.readLines()) {
      if (line.key !== undefined && line.value !== undefined && isStateKey(line.key)) {
        entries.push({ key: line.key, value: line.value });
      }
    }
    return entries;
  }

  /**
   * Copy the file aside as <file>.backup.<YYYYMMDD_HHMMSS>.
   */
  backup(now: Date = new Date()): string | undefined {
    if (!this.exists()) {
      return undefined;
    }

    const backupFile = `${this.filePath}.backup.${backupSuffix(now)}`;
    if (this.dryRun) {
      this.logger.info(`[DRY RUN] Would back up state file to: ${backupFile}`);
      return undefined;
    }

    copyFileSync(this.filePath, backupFile);
    this.logger.info(`State file backed up to: ${backupFile}`);
    return backupFile;
  }

  private readLines(): StateLine[] {
    if (!this.exists()) {
      return [];
    }

    const content = readFileSync(this.filePath, 'utf-8');
    if (content === '') {
      return [];
    }

    return content
      .replace(/\n$/, '')
      .split('\n')
      .map(parseLine);
  }

  private writeLines(lines: StateLine[]): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    const body = lines.map(line => line.raw).join('\n');
    writeFileSync(this.filePath, body === '' ? '' : `${body}\n`);
  }
}

function parseLine(raw: string): StateLine {
  const line = raw.replace(/\r$/, '');
  const delimiter = line.indexOf('=');
  if (delimiter <= 0) {
    return { raw: line };
  }

  return {
    raw: line,
    key: line.slice(0, delimiter),
    value: stripAnsi(line.slice(delimiter + 1))
  };
}

function backupSuffix(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}
