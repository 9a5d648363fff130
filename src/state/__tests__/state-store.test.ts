import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { StateStore, isStateKey, stripAnsi } from '../state-store.js';
import { Logger } from '../../logging/logger.js';
import { StateKeyNotFoundError } from '../../errors/index.js';

describe('StateStore', () => {
  let dir: string;
  let filePath: string;
  let logFile: string;
  let store: StateStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'state-store-'));
    filePath = join(dir, '.env');
    logFile = join(dir, 'setup.log');
    store = new StateStore({ filePath, logger: Logger.create({ terminal: false, logFile }) });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('put / get', () => {
    it('should keep exactly one entry per key, last write wins', () => {
      store.put('VPC_ID', 'vpc-111');
      store.put('VPC_ID', 'vpc-222');

      expect(store.get('VPC_ID')).toBe('vpc-222');
      expect(readFileSync(filePath, 'utf-8')).toBe('VPC_ID=vpc-222\n');
    });

    it('should append the rewritten key after the others', () => {
      store.put('VPC_ID', 'vpc-111');
      store.put('IGW_ID', 'igw-111');
      store.put('VPC_ID', 'vpc-222');

      expect(readFileSync(filePath, 'utf-8')).toBe('IGW_ID=igw-111\nVPC_ID=vpc-222\n');
    });

    it('should create the file on first write', () => {
      expect(store.exists()).toBe(false);
      store.put('KEY_NAME', 'AutoKeyPair');
      expect(store.exists()).toBe(true);
    });

    it('should treat an empty value as a value', () => {
      store.put('PUBLIC_IP', '');
      expect(store.get('PUBLIC_IP')).toBe('');
      expect(store.has('PUBLIC_IP')).toBe(true);
    });

    it('should throw StateKeyNotFoundError for a missing key or file', () => {
      expect(() => store.get('VPC_ID')).toThrow(StateKeyNotFoundError);

      store.put('IGW_ID', 'igw-1');
      expect(() => store.get('VPC_ID')).toThrow(`Key not found in state file ${filePath}: VPC_ID`);
    });

    it('should reject multi-line values', () => {
      expect(() => store.put('VPC_ID', 'vpc-1\nIGW_ID=igw-1')).toThrow('must be a single line');
    });

    it('should log the saved entry to the log file', () => {
      store.put('VPC_ID', 'vpc-111');
      expect(readFileSync(logFile, 'utf-8')).toMatch(/\[INFO\] \[main\] State saved: VPC_ID=vpc-111\n$/);
    });
  });

  describe('parsing', () => {
    it('should split on the first = only', () => {
      writeFileSync(filePath, 'WELCOME_FILE_URL=https://example.test/a?b=c\n');
      expect(store.get('WELCOME_FILE_URL')).toBe('https://example.test/a?b=c');
    });

    it('should strip ANSI color sequences from values', () => {
      writeFileSync(filePath, 'VPC_ID=\x1b[0;32mvpc-123\x1b[0m\n');
      expect(store.get('VPC_ID')).toBe('vpc-123');
    });

    it('should ignore malformed lines and unknown keys but keep them on rewrite', () => {
      writeFileSync(filePath, '# comment\n=orphan\nCUSTOM_NOTE=hello\nVPC_ID=vpc-1\n');

      expect(store.snapshot()).toEqual([{ key: 'VPC_ID', value: 'vpc-1' }]);

      store.put('IGW_ID', 'igw-1');
      expect(readFileSync(filePath, 'utf-8')).toBe('# comment\n=orphan\nCUSTOM_NOTE=hello\nVPC_ID=vpc-1\nIGW_ID=igw-1\n');
    });

    it('should tolerate CRLF line endings', () => {
      writeFileSync(filePath, 'VPC_ID=vpc-1\r\nIGW_ID=igw-1\r\n');
      expect(store.snapshot()).toEqual([
        { key: 'VPC_ID', value: 'vpc-1' },
        { key: 'IGW_ID', value: 'igw-1' }
      ]);
    });
  });

  describe('find', () => {
    it('should return undefined instead of throwing', () => {
      expect(store.find('INSTANCE_ID')).toBeUndefined();
    });
  });

  describe('remove / clear', () => {
    it('should remove only the named keys', () => {
      store.put('PUBLIC_SUBNET_ID', 'subnet-1');
      store.put('PUBLIC_SUBNET_AZ', 'eu-west-1a');
      store.put('VPC_ID', 'vpc-1');

      store.remove('PUBLIC_SUBNET_ID', 'PUBLIC_SUBNET_AZ');

      expect(store.snapshot()).toEqual([{ key: 'VPC_ID', value: 'vpc-1' }]);
    });

    it('should leave an empty file behind on clear', () => {
      store.put('VPC_ID', 'vpc-1');
      store.clear();

      expect(store.exists()).toBe(true);
      expect(readFileSync(filePath, 'utf-8')).toBe('');
      expect(store.snapshot()).toEqual([]);
    });
  });

  describe('backup', () => {
    it('should copy the file with a timestamp suffix', () => {
      store.put('VPC_ID', 'vpc-1');

      const backup = store.backup(new Date(2024, 2, 5, 7, 8, 9));

      expect(backup).toBe(`${filePath}.backup.20240305_070809`);
      expect(readFileSync(`${filePath}.backup.20240305_070809`, 'utf-8')).toBe('VPC_ID=vpc-1\n');
    });

    it('should return undefined when there is no state file', () => {
      expect(store.backup()).toBeUndefined();
    });
  });

  describe('dry run', () => {
    let dryStore: StateStore;

    beforeEach(() => {
      dryStore = new StateStore({ filePath, logger: Logger.create({ terminal: false, logFile }), dryRun: true });
    });

    it('should never write the file', () => {
      expect(dryStore.initialize()).toBe(false);
      dryStore.put('VPC_ID', 'vpc-1');
      dryStore.clear();

      expect(existsSync(filePath)).toBe(false);
      expect(readFileSync(logFile, 'utf-8')).toContain('[DRY RUN] Would save state: VPC_ID=vpc-1');
    });

    it('should leave existing entries in place on remove and clear', () => {
      writeFileSync(filePath, 'VPC_ID=vpc-1\n');

      dryStore.remove('VPC_ID');
      dryStore.clear();

      expect(readFileSync(filePath, 'utf-8')).toBe('VPC_ID=vpc-1\n');
    });
  });
});

describe('isStateKey', () => {
  it('should accept only the known keys', () => {
    expect(isStateKey('INSTANCE_ID')).toBe(true);
    expect(isStateKey('instance_id')).toBe(false);
    expect(isStateKey('CUSTOM_NOTE')).toBe(false);
  });
});

describe('stripAnsi', () => {
  it('should remove color codes', () => {
    expect(stripAnsi('\x1b[1;31mred\x1b[0m text')).toBe('red text');
  });
});
