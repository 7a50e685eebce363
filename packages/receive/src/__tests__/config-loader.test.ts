import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  DEFAULT_RECEIVE_CONFIG,
  buildReceiveConfig,
  loadConfig,
  loadConfigFromString,
  resolveEnvRef,
  validateReceiveConfig,
} from '../config-loader.js';

const ENV_KEYS = ['CODEDROP_CONFIG', 'CODEDROP_RELAY_URL', 'CODEDROP_TRANSIT_HELPER', 'TEST_RELAY'] as const;

describe('config-loader', () => {
  const savedEnv = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      savedEnv.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = savedEnv.get(key);
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  describe('resolveEnvRef', () => {
    it('returns plain values unchanged', () => {
      expect(resolveEnvRef('ws://relay.test/v1')).toBe('ws://relay.test/v1');
    });

    it('resolves $NAME from the environment', () => {
      process.env['TEST_RELAY'] = 'ws://from-env.test/v1';
      expect(resolveEnvRef('$TEST_RELAY')).toBe('ws://from-env.test/v1');
    });

    it('returns undefined for an unset variable', () => {
      expect(resolveEnvRef('$TEST_RELAY')).toBeUndefined();
    });
  });

  describe('loadConfigFromString', () => {
    it('parses every known setting', () => {
      const result = loadConfigFromString(`
relay-url: ws://relay.test/v1
transit-helper: tcp:transit.test:4001
code-length: 3
verify: true
hide-progress: true
accept-file: false
no-listen: true
log-level: debug
`);
      expect(result).toEqual({
        success: true,
        config: {
          relayUrl: 'ws://relay.test/v1',
          transitHelper: 'tcp:transit.test:4001',
          codeLength: 3,
          verify: true,
          hideProgress: true,
          acceptFile: false,
          noListen: true,
          logLevel: 'debug',
        },
      });
    });

    it('treats an empty document as an empty config', () => {
      expect(loadConfigFromString('')).toEqual({ success: true, config: {} });
    });

    it('disables the transit helper with an explicit null', () => {
      expect(loadConfigFromString('transit-helper: null')).toEqual({
        success: true,
        config: { transitHelper: null },
      });
    });

    it('resolves environment references', () => {
      process.env['TEST_RELAY'] = 'ws://from-env.test/v1';
      expect(loadConfigFromString('relay-url: $TEST_RELAY')).toEqual({
        success: true,
        config: { relayUrl: 'ws://from-env.test/v1' },
      });
    });

    it('reports an unset environment reference', () => {
      const result = loadConfigFromString('relay-url: $TEST_RELAY');
      expect(result).toEqual({
        success: false,
        errors: [{ field: 'relay-url', message: 'Environment variable TEST_RELAY is not set' }],
      });
    });

    it('reports unknown keys and wrong types together', () => {
      const result = loadConfigFromString('colour: blue\nverify: "yes"\ncode-length: 0\n');
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.errors.map((e) => e.field)).toEqual(['colour', 'code-length', 'verify']);
    });

    it('rejects an unknown log level', () => {
      const result = loadConfigFromString('log-level: loud');
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.field).toBe('log-level');
    });

    it('rejects a document that is not a mapping', () => {
      expect(loadConfigFromString('- a\n- b\n')).toEqual({
        success: false,
        errors: [{ field: 'yaml', message: 'YAML content is not a mapping' }],
      });
    });

    it('reports YAML syntax errors', () => {
      const result = loadConfigFromString('relay-url: [unclosed');
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.errors[0]?.field).toBe('yaml');
      expect(result.errors[0]?.message).toMatch(/^Failed to parse YAML: /);
    });
  });

  describe('loadConfig', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'codedrop-config-test-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('returns an empty config without a path', () => {
      expect(loadConfig()).toEqual({ success: true, config: {} });
    });

    it('reads the given file', () => {
      const file = path.join(tmpDir, 'codedrop.yaml');
      fs.writeFileSync(file, 'verify: true\n');
      expect(loadConfig(file)).toEqual({ success: true, config: { verify: true } });
    });

    it('falls back to CODEDROP_CONFIG', () => {
      const file = path.join(tmpDir, 'codedrop.yaml');
      fs.writeFileSync(file, 'code-length: 4\n');
      process.env['CODEDROP_CONFIG'] = file;
      expect(loadConfig()).toEqual({ success: true, config: { codeLength: 4 } });
    });

    it('reports a missing file', () => {
      const result = loadConfig(path.join(tmpDir, 'missing.yaml'));
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.errors[0]?.field).toBe('filePath');
    });
  });

  describe('buildReceiveConfig', () => {
    it('applies defaults', () => {
      const config = buildReceiveConfig({}, { cwd: '/srv/incoming' });
      expect(config).toEqual({
        ...DEFAULT_RECEIVE_CONFIG,
        code: undefined,
        outputFile: undefined,
        cwd: path.resolve('/srv/incoming'),
      });
    });

    it('prefers overrides over the file and the file over the environment', () => {
      process.env['CODEDROP_RELAY_URL'] = 'ws://env.test/v1';
      process.env['CODEDROP_TRANSIT_HELPER'] = 'tcp:env.test:1';

      const fromFile = buildReceiveConfig({ relayUrl: 'ws://file.test/v1', codeLength: 4 }, {});
      expect(fromFile.relayUrl).toBe('ws://file.test/v1');
      expect(fromFile.transitHelper).toBe('tcp:env.test:1');
      expect(fromFile.codeLength).toBe(4);

      const fromFlags = buildReceiveConfig({ relayUrl: 'ws://file.test/v1' }, { relayUrl: 'ws://flag.test/v1' });
      expect(fromFlags.relayUrl).toBe('ws://flag.test/v1');
    });

    it('keeps a null transit helper from the file', () => {
      process.env['CODEDROP_TRANSIT_HELPER'] = 'tcp:env.test:1';
      expect(buildReceiveConfig({ transitHelper: null }, {}).transitHelper).toBeNull();
    });

    it('resolves a relative cwd', () => {
      expect(buildReceiveConfig({}, { cwd: 'downloads' }).cwd).toBe(path.resolve('downloads'));
    });
  });

  describe('validateReceiveConfig', () => {
    it('accepts the defaults', () => {
      expect(validateReceiveConfig(buildReceiveConfig())).toEqual([]);
    });

    it('rejects a code combined with zero mode', () => {
      const errors = validateReceiveConfig(buildReceiveConfig({}, { code: '1-a-b', zeroMode: true }));
      expect(errors).toEqual([{ field: 'code', message: 'A code cannot be combined with zero mode' }]);
    });

    it('rejects an empty output name and a zero code length', () => {
      const errors = validateReceiveConfig(buildReceiveConfig({}, { outputFile: ' ', codeLength: 0 }));
      expect(errors.map((e) => e.field)).toEqual(['codeLength', 'outputFile']);
    });
  });
});
