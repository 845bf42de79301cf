import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { configFromEnv, loadConfig, parseConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';
import { GB } from '../src/utils/format.js';

const ENV = {
  QB_URL: 'http://qbittorrent:8080/',
  QB_PASSWORD: 'test-secret',
  MONITORED_DIRS: '/data/tv, /data/movies',
};

describe('configFromEnv', () => {
  it('drops unset and empty variables', () => {
    expect(configFromEnv({ PORT: '', HOST: undefined, MAX_ACTIVE: '3' })).toEqual({ maxActive: '3' });
  });

  it('describes a single downloader through QB_* variables', () => {
    expect(configFromEnv(ENV)).toEqual({
      directories: [{ path: '/data/tv' }, { path: '/data/movies' }],
      downloaders: [{
        id: 'qbittorrent',
        url: 'http://qbittorrent:8080/',
        username: 'admin',
        password: 'test-secret',
        tag: null,
      }],
    });
  });
});

describe('parseConfig', () => {
  it('applies defaults', () => {
    const config = parseConfig(undefined, ENV);

    expect(config).toEqual({
      port: 8090,
      host: '0.0.0.0',
      dataPath: '/data',
      tickIntervalSeconds: 120,
      commandTimeoutMs: 10000,
      maxActiveBytes: null,
      ignoreCase: true,
      webhookUrl: null,
      policy: {
        victimOrder: 'largest-remaining',
        releaseOrder: 'oldest-paused',
        smartSkip: true,
        deadlockCycles: 2,
      },
      downloaders: [{
        id: 'qbittorrent',
        url: 'http://qbittorrent:8080',
        username: 'admin',
        password: 'test-secret',
        tag: null,
        maxActive: 5,
        directories: [
          { path: '/data/tv', lowWatermark: 5 * GB },
          { path: '/data/movies', lowWatermark: 5 * GB },
        ],
      }],
    });
  });

  it('lets file values override the environment', () => {
    const config = parseConfig({
      maxActive: 2,
      maxActiveGb: 100,
      smartSkip: false,
      victimOrder: 'newest-first',
      downloaders: [
        {
          id: 'seedbox',
          url: 'http://seedbox:8080',
          tag: 'guarded',
          maxActive: 8,
          directories: [{ path: '/srv/dl', lowWatermarkGb: 20 }],
        },
        { id: 'home', url: 'http://home:8080' },
      ],
    }, { ...ENV, SMART_SKIP: 'true', LOW_WATERMARK_GB: '10' });

    expect(config.maxActiveBytes).toBe(100 * GB);
    expect(config.policy.smartSkip).toBe(false);
    expect(config.policy.victimOrder).toBe('newest-first');
    expect(config.downloaders).toEqual([
      {
        id: 'seedbox',
        url: 'http://seedbox:8080',
        username: '',
        password: '',
        tag: 'guarded',
        maxActive: 8,
        directories: [{ path: '/srv/dl', lowWatermark: 20 * GB }],
      },
      {
        id: 'home',
        url: 'http://home:8080',
        username: '',
        password: '',
        tag: null,
        maxActive: 2,
        directories: [
          { path: '/data/tv', lowWatermark: 10 * GB },
          { path: '/data/movies', lowWatermark: 10 * GB },
        ],
      },
    ]);
  });

  it('reads booleans from environment strings', () => {
    expect(parseConfig(undefined, { ...ENV, IGNORE_CASE: 'false' }).ignoreCase).toBe(false);
  });

  it('requires a downloader', () => {
    expect(() => parseConfig({ directories: [{ path: '/data' }] }, {})).toThrow(
      'Invalid configuration: downloaders: Required',
    );
  });

  it('rejects relative directories and names the field', () => {
    const error = (() => {
      try {
        parseConfig({ directories: [{ path: 'data' }] }, ENV);
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      field: 'directories.0.path',
      message: 'Invalid configuration: directories.0.path: must be an absolute path',
    });
  });

  it('rejects duplicate downloader ids', () => {
    expect(() => parseConfig({
      downloaders: [{ id: 'qb', url: 'http://a:1' }, { id: 'qb', url: 'http://b:1' }],
    }, { MONITORED_DIRS: '/data' })).toThrow('downloaders.1.id: duplicate downloader id "qb"');
  });

  it('rejects a downloader without directories', () => {
    expect(() => parseConfig({ downloaders: [{ id: 'qb', url: 'http://a:1' }] }, {})).toThrow(
      'downloaders.0.directories: no monitored directories (set them on the downloader or globally)',
    );
  });

  it('rejects a non-positive watermark', () => {
    expect(() => parseConfig({ lowWatermarkGb: 0 }, ENV)).toThrow(ConfigurationError);
  });

  it('rejects a file that is not an object', () => {
    expect(() => parseConfig([], ENV)).toThrow('Configuration file must contain a JSON object');
  });
});

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'space-guard-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads the configuration file', () => {
    const file = path.join(tmpDir, 'config.json');
    fs.writeFileSync(file, JSON.stringify({ port: 9000, tickIntervalSeconds: 30 }));

    const config = loadConfig(file, ENV);

    expect(config.port).toBe(9000);
    expect(config.tickIntervalSeconds).toBe(30);
  });

  it('falls back to the environment without a file', () => {
    expect(loadConfig(path.join(tmpDir, 'missing.json'), ENV).port).toBe(8090);
  });

  it('reports malformed JSON', () => {
    const file = path.join(tmpDir, 'config.json');
    fs.writeFileSync(file, '{ nope');

    expect(() => loadConfig(file, ENV)).toThrow(`Cannot read ${file}`);
  });
});
