import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { dependenciesCachePath, gameDataPath, gameOf, loadConfig, resolveConfig, schemaFilePath } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('config', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'config-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should fill in defaults', () => {
    const config = resolveConfig({});

    expect(config.game).toBe('warhammer_3');
    expect(config.gamePath).toBeNull();
    expect(config.cacheDir).toBe('.pack-workbench');
    expect(config.lazyLoading).toBe(true);
    expect(config.queueCapacity).toBe(64);
  });

  it('should let the environment override the file and overrides win over both', async () => {
    const configFile = join(dir, 'workbench.json');
    await writeFile(configFile, JSON.stringify({ game: 'troy', cacheDir: 'from-file', lazyLoading: true }));

    const config = await loadConfig({
      configFile,
      env: { PACK_WORKBENCH_CACHE_DIR: 'from-env', PACK_WORKBENCH_LAZY_LOADING: 'off', PACK_WORKBENCH_GAME_PATH: '' },
      overrides: { game: 'attila', gamePath: undefined },
    });

    expect(config.game).toBe('attila');
    expect(config.cacheDir).toBe('from-env');
    expect(config.lazyLoading).toBe(false);
    expect(config.gamePath).toBeNull();
  });

  it('should reject a boolean variable it cannot read', async () => {
    await expect(loadConfig({ env: { PACK_WORKBENCH_ALLOW_EDITING_CA_PACKS: 'maybe' } }))
      .rejects.toThrow('PACK_WORKBENCH_ALLOW_EDITING_CA_PACKS must be a boolean, got "maybe"');
  });

  it('should reject unknown games and keys', () => {
    expect(() => resolveConfig({ game: 'pong' })).toThrow(ConfigError);
    expect(() => resolveConfig({ colour: 'blue' })).toThrow(ConfigError);
  });

  it('should reject a config file that is not a JSON object', async () => {
    const configFile = join(dir, 'list.json');
    await writeFile(configFile, '[1, 2]');

    await expect(loadConfig({ configFile, env: {} })).rejects.toThrow(`Config file ${configFile} must hold a JSON object`);
    await expect(loadConfig({ configFile: join(dir, 'missing.json'), env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it('should derive paths from the game', () => {
    const config = resolveConfig({ game: 'troy', cacheDir: 'cache', gamePath: 'games/troy' });
    const game = gameOf(config);

    expect(schemaFilePath(config, game)).toBe(join('cache', 'schema_troy.json'));
    expect(schemaFilePath({ ...config, schemaPath: 'my-schema.json' }, game)).toBe('my-schema.json');
    expect(dependenciesCachePath(config, game)).toBe(join('cache', 'troy.pdep'));
    expect(gameDataPath(config)).toBe(join('games/troy', 'data'));
  });
});
