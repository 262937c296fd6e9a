/**
 * Tests for configuration index (src/config/index.ts)
 *
 * Tests the following functionality:
 * - loadConfig() lookup order (explicit path, AGENTMESH_CONFIG, search paths)
 * - API key fallback to ANTHROPIC_API_KEY
 * - toLoggerConfig() mapping
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { loadConfig, getDefaultConfig, toLoggerConfig } from './index.js';
import { ConfigurationError } from '../utils/errors.js';

vi.mock('fs', () => ({
  readFileSync: vi.fn(),
  existsSync: vi.fn(),
}));

vi.mock('../utils/logger.js', () => ({
  createLogger: vi.fn(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

describe('loadConfig', () => {
  beforeEach(() => {
    vi.mocked(existsSync).mockReset();
    vi.mocked(readFileSync).mockReset();
  });

  it('should return defaults when no file is found', () => {
    vi.mocked(existsSync).mockReturnValue(false);

    const loaded = loadConfig({ env: {}, searchPaths: ['/work'] });

    expect(loaded.source).toBeUndefined();
    expect(loaded.config).toEqual(getDefaultConfig());
  });

  it('should load the first file found in the search paths', () => {
    const found = resolve('/work', 'agentmesh.config.yaml');
    vi.mocked(existsSync).mockImplementation((path) => String(path) === found);
    vi.mocked(readFileSync).mockReturnValue('session:\n  inactiveHours: 2\n');

    const loaded = loadConfig({ env: {}, searchPaths: ['/work'] });

    expect(loaded.source).toBe(found);
    expect(loaded.config.session.inactiveHours).toBe(2);
  });

  it('should prefer an explicit path over AGENTMESH_CONFIG', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('{}');

    const loaded = loadConfig({ path: '/etc/explicit.yaml', env: { AGENTMESH_CONFIG: '/etc/from-env.yaml' } });

    expect(loaded.source).toBe(resolve('/etc/explicit.yaml'));
    expect(readFileSync).toHaveBeenCalledWith(resolve('/etc/explicit.yaml'), 'utf-8');
  });

  it('should use AGENTMESH_CONFIG when no path is given', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('{}');

    expect(loadConfig({ env: { AGENTMESH_CONFIG: '/etc/from-env.yaml' } }).source).toBe(
      resolve('/etc/from-env.yaml')
    );
  });

  it('should raise when an explicitly named file is missing', () => {
    vi.mocked(existsSync).mockReturnValue(false);

    expect(() => loadConfig({ path: '/etc/missing.yaml', env: {} })).toThrow(
      `Configuration file not found: ${resolve('/etc/missing.yaml')}`
    );
  });

  it('should raise ConfigurationError for an invalid file', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('delivery:\n  inboxCapacity: 0\n');

    expect(() => loadConfig({ path: '/etc/bad.yaml', env: {} })).toThrow(ConfigurationError);
  });

  it('should fall back to ANTHROPIC_API_KEY for the API key', () => {
    vi.mocked(existsSync).mockReturnValue(false);

    const loaded = loadConfig({ env: { ANTHROPIC_API_KEY: 'test-key' }, searchPaths: [] });

    expect(loaded.config.llm.apiKey).toBe('test-key');
  });

  it('should keep a configured API key over the environment', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('llm:\n  apiKey: file-key\n');

    const loaded = loadConfig({ path: '/etc/agentmesh.yaml', env: { ANTHROPIC_API_KEY: 'test-key' } });

    expect(loaded.config.llm.apiKey).toBe('file-key');
  });
});

describe('toLoggerConfig', () => {
  it('should map a logging section without a file', () => {
    expect(toLoggerConfig({ level: 'warn', pretty: false, rotate: false }, {})).toEqual({
      level: 'warn',
      prettyPrint: false,
      fileLogging: false,
      logDir: undefined,
      fileName: undefined,
      rotate: false,
    });
  });

  it('should split the log file into directory and name', () => {
    expect(toLoggerConfig({ level: 'info', pretty: true, file: 'logs/mesh.log', rotate: true }, {})).toMatchObject({
      fileLogging: true,
      logDir: 'logs',
      fileName: 'mesh.log',
      rotate: true,
    });
  });

  it('should leave the level to LOG_LEVEL when it is set', () => {
    expect(toLoggerConfig({ level: 'info', pretty: true, rotate: false }, { LOG_LEVEL: 'debug' }).level).toBeUndefined();
  });
});
