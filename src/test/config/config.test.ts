/**
 * Settings Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  applyEnvOverrides,
  loadSettings,
  parseSettings,
  SettingsValidationError,
  validateSettings,
} from '../../main/config';
import { DEFAULT_MCP_SETTINGS } from '../../shared/types/mcp';
import { loggedMessages } from '../helpers/testUtils';

const FIXTURE = fileURLToPath(new URL('../fixtures/relay.settings.json', import.meta.url));

describe('validateSettings', () => {
  it('accepts an empty object', () => {
    expect(validateSettings({})).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('collects every error in one pass', () => {
    const result = validateSettings({
      defaultTimeout: 0,
      servers: {
        a: { transport: { type: 'stdio' } },
        b: { transport: { type: 'websocket', url: 'http://example.test' } },
        c: { transport: { type: 'tcp' } },
      },
      logging: { level: 'verbose' },
    });

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => [e.field, e.message])).toEqual([
      ['defaultTimeout', 'defaultTimeout must be between 1 and 600000'],
      ['servers.a.transport.command', 'stdio transport requires a command'],
      ['servers.b.transport.url', 'url must be a ws:// or wss:// URL'],
      ['servers.c.transport.type', 'servers.c.transport.type must be one of: stdio, websocket'],
      ['logging.level', 'logging.level must be one of: debug, info, warn, error'],
    ]);
  });

  it('reports wrong value types field by field', () => {
    const result = validateSettings({
      clientInfo: { name: '  ' },
      servers: {
        x: {
          enabled: 'yes',
          transport: { type: 'stdio', command: 'run', args: ['ok', 3], env: { A: 1 } },
        },
      },
    });

    expect(result.errors.map((e) => [e.field, e.message])).toEqual([
      ['clientInfo.name', 'clientInfo.name must be a non-empty string'],
      ['servers.x.transport.args[1]', 'servers.x.transport.args items must be strings'],
      ['servers.x.transport.env.A', 'servers.x.transport.env values must be strings'],
      ['servers.x.enabled', 'servers.x.enabled must be a boolean'],
    ]);
  });

  it('warns without failing', () => {
    const result = validateSettings({
      connectTimeout: 500,
      extra: true,
      servers: {
        dev: {
          retries: 3,
          transport: {
            type: 'websocket',
            url: 'ws://localhost:9000',
            headers: { Authorization: 'Bearer test-token' },
          },
        },
      },
    });

    expect(result.valid).toBe(true);
    expect(result.warnings.map((w) => [w.field, w.message])).toEqual([
      ['extra', 'Unknown field extra is ignored'],
      ['connectTimeout', 'connectTimeout is under one second'],
      ['servers.dev.retries', 'Unknown field retries is ignored'],
      ['servers.dev.transport.url', 'Credentials are sent over an unencrypted connection'],
    ]);
  });

  it('rejects servers that are not keyed by name', () => {
    const result = validateSettings({ servers: [{ transport: { type: 'stdio', command: 'x' } }] });
    expect(result.errors[0].message).toBe('servers must be an object keyed by server name');
  });
});

describe('parseSettings', () => {
  it('returns the defaults for a missing value', () => {
    expect(parseSettings(undefined, {})).toEqual(DEFAULT_MCP_SETTINGS);
  });

  it('throws one error naming every problem', () => {
    expect(() => parseSettings({ defaultTimeout: 'fast' }, {}, 'relay.json')).toThrow(
      'Invalid settings in relay.json: defaultTimeout: defaultTimeout must be a valid number'
    );
    expect(() => parseSettings([], {})).toThrow('Invalid settings: (root): Settings must be a JSON object');
    expect(() => parseSettings([], {})).toThrow(SettingsValidationError);
  });

  it('logs warnings', () => {
    parseSettings({ extra: 1 }, {});
    expect(loggedMessages('warn')).toEqual(['Settings warning']);
  });

  it('applies environment overrides', () => {
    const settings = parseSettings({ defaultTimeout: 2000 }, {
      MCP_RELAY_TIMEOUT: '45000',
      MCP_RELAY_LOG_LEVEL: 'debug',
    });
    expect(settings.defaultTimeout).toBe(45000);
    expect(settings.logging.level).toBe('debug');
  });
});

describe('applyEnvOverrides', () => {
  it('ignores unusable values with a warning', () => {
    const settings = applyEnvOverrides(DEFAULT_MCP_SETTINGS, {
      MCP_RELAY_TIMEOUT: '1.5',
      MCP_RELAY_LOG_LEVEL: 'loud',
    });

    expect(settings.defaultTimeout).toBe(30000);
    expect(settings.logging.level).toBe('info');
    expect(loggedMessages('warn')).toEqual([
      'Ignoring invalid MCP_RELAY_TIMEOUT',
      'Ignoring invalid MCP_RELAY_LOG_LEVEL',
    ]);
  });

  it('leaves the input untouched', () => {
    const settings = applyEnvOverrides(DEFAULT_MCP_SETTINGS, { MCP_RELAY_TIMEOUT: '700' });
    expect(settings.defaultTimeout).toBe(700);
    expect(DEFAULT_MCP_SETTINGS.defaultTimeout).toBe(30000);
  });

  it('skips empty variables', () => {
    expect(applyEnvOverrides(DEFAULT_MCP_SETTINGS, { MCP_RELAY_TIMEOUT: '' })).toEqual(DEFAULT_MCP_SETTINGS);
    expect(loggedMessages('warn')).toEqual([]);
  });
});

describe('loadSettings', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mcp-relay-settings-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads and validates a settings file', async () => {
    const settings = await loadSettings(FIXTURE, {});

    expect(settings).toEqual({
      clientInfo: { name: 'relay-tests', version: '0.0.1' },
      defaultTimeout: 15000,
      connectTimeout: 10000,
      servers: {
        files: {
          description: 'Local notes',
          transport: {
            type: 'stdio',
            command: 'notes-server',
            args: ['--root', '/tmp/notes'],
            env: { NOTES_LOG: 'quiet' },
          },
        },
        search: {
          timeout: 5000,
          transport: {
            type: 'websocket',
            url: 'wss://search.example.test/mcp',
            headers: { Authorization: 'Bearer test-token' },
          },
        },
        legacy: {
          enabled: false,
          transport: { type: 'stdio', command: 'legacy-server' },
        },
      },
      logging: { level: 'warn', stderr: true },
    });
    expect(loggedMessages('info')).toContain('Settings loaded');
  });

  it('falls back to the defaults when the file is missing', async () => {
    const settings = await loadSettings(path.join(dir, 'absent.json'), { MCP_RELAY_TIMEOUT: '5000' });

    expect(settings).toEqual({ ...DEFAULT_MCP_SETTINGS, defaultTimeout: 5000 });
    expect(loggedMessages('info')).toEqual(['No settings file; using defaults']);
  });

  it('reports malformed JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ "servers": ', 'utf-8');

    const attempt = loadSettings(file, {});
    await expect(attempt).rejects.toBeInstanceOf(SettingsValidationError);
    await expect(attempt).rejects.toThrow(`Invalid settings in ${file}: (root): Invalid JSON: `);
  });

  it('reports files that cannot be read', async () => {
    await expect(loadSettings(dir, {})).rejects.toThrow(`Failed to read settings from ${dir}: `);
  });
});
