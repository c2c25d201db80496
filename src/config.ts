/**
 * Tool configuration: defaults, an optional JSON file, environment variables
 * and command-line overrides, in increasing priority.
 */
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';
import { DEFAULT_GAME_KEY, SUPPORTED_GAMES, type GameInfo } from './games.js';

export const ENV_PREFIX = 'PACK_WORKBENCH_';

const configSchema = z.object({
  game: z.string().refine((key) => SUPPORTED_GAMES.some((game) => game.key === key), {
    message: `expected one of ${SUPPORTED_GAMES.map((game) => game.key).join(', ')}`,
  }).default(DEFAULT_GAME_KEY),
  /** Install folder of the game; its packs live in `data/`. */
  gamePath: z.string().min(1).nullable().default(null),
  /** Schema file; `<cacheDir>/<game schema file>` when unset. */
  schemaPath: z.string().min(1).nullable().default(null),
  cacheDir: z.string().min(1).default('.pack-workbench'),
  /** Assembly-kit table dump used when generating the dependency cache. */
  assemblyKitPath: z.string().min(1).nullable().default(null),
  lazyLoading: z.boolean().default(true),
  allowEditingOfCaPacks: z.boolean().default(false),
  optimizeNotRenamed: z.boolean().default(false),
  queueCapacity: z.number().int().positive().default(64),
}).strict();

export type WorkbenchConfig = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

/** Environment variables read by {@link loadConfig}, and the key each sets. */
const ENV_KEYS = {
  GAME: 'game',
  GAME_PATH: 'gamePath',
  SCHEMA_PATH: 'schemaPath',
  CACHE_DIR: 'cacheDir',
  LAZY_LOADING: 'lazyLoading',
  ALLOW_EDITING_CA_PACKS: 'allowEditingOfCaPacks',
} as const satisfies Record<string, keyof WorkbenchConfig>;

const BOOLEAN_KEYS: ReadonlySet<keyof WorkbenchConfig> = new Set(['lazyLoading', 'allowEditingOfCaPacks']);

function parseBoolean(name: string, value: string): boolean {
  const normalised = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalised)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalised)) return false;
  throw new ConfigError(`${name} must be a boolean, got ${JSON.stringify(value)}`);
}

function fromEnv(env: Readonly<Record<string, string | undefined>>): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [suffix, key] of Object.entries(ENV_KEYS)) {
    const name = `${ENV_PREFIX}${suffix}`;
    const value = env[name];
    if (value === undefined || value === '') {
      continue;
    }
    values[key] = BOOLEAN_KEYS.has(key) ? parseBoolean(name, value) : value;
  }
  return values;
}

async function fromFile(configFile: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(configFile, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${configFile}: ${describeError(error)}`, error);
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${configFile} is not valid JSON`, error);
  }
  if (json === null || typeof json !== 'object' || Array.isArray(json)) {
    throw new ConfigError(`Config file ${configFile} must hold a JSON object`);
  }
  return { ...json };
}

function withoutUndefined(values: Readonly<Record<string, unknown>>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Validates a configuration, filling in defaults.
 * @throws {ConfigError} If a value is invalid or a key is unknown
 */
export function resolveConfig(input: unknown, source = 'configuration'): WorkbenchConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')}`);
  }
  return result.data;
}

export async function loadConfig({
  configFile,
  env = process.env,
  overrides = {},
}: {
  readonly configFile?: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly overrides?: Partial<ConfigInput>;
} = {}): Promise<WorkbenchConfig> {
  const merged = {
    ...(configFile ? await fromFile(configFile) : {}),
    ...fromEnv(env),
    ...withoutUndefined(overrides),
  };
  return resolveConfig(merged, configFile ?? 'configuration');
}

export function gameOf(config: WorkbenchConfig): GameInfo {
  const game = SUPPORTED_GAMES.find((candidate) => candidate.key === config.game);
  if (!game) {
    throw new ConfigError(`Unknown game ${config.game}`);
  }
  return game;
}

export function schemaFilePath(config: WorkbenchConfig, game: GameInfo): string {
  return config.schemaPath ?? join(config.cacheDir, game.schemaFileName);
}

export function dependenciesCachePath(config: WorkbenchConfig, game: GameInfo): string {
  return join(config.cacheDir, game.dependenciesCacheFileName);
}

/** Folder holding the game's packs, when the install folder is known. */
export function gameDataPath(config: WorkbenchConfig): string | null {
  return config.gamePath ? join(config.gamePath, 'data') : null;
}
