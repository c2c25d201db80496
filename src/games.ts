/**
 * Per-game format knowledge.
 */
import type { PackFileType, PfhVersion } from './constants/pack-constants.js';
import { ConfigError } from './errors.js';

export interface GameInfo {
  readonly key: string;
  readonly displayName: string;
  /** Container format written for each pack type. */
  readonly pfhVersions: Readonly<Record<PackFileType, PfhVersion>>;
  readonly schemaFileName: string;
  readonly dependenciesCacheFileName: string;
  /** Whether the game reads packs with compressed payloads. */
  readonly supportsCompression: boolean;
  /** Whether newly created tables carry a GUID header. */
  readonly tableGuids: boolean;
}

function uniform(version: PfhVersion): Record<PackFileType, PfhVersion> {
  return { Boot: version, Release: version, Patch: version, Mod: version, Movie: version };
}

export const SUPPORTED_GAMES: readonly GameInfo[] = [
  {
    key: 'warhammer_3',
    displayName: 'Warhammer III',
    pfhVersions: uniform('PFH5'),
    schemaFileName: 'schema_wh3.json',
    dependenciesCacheFileName: 'wh3.pdep',
    supportsCompression: true,
    tableGuids: true,
  },
  {
    key: 'troy',
    displayName: 'Troy',
    pfhVersions: uniform('PFH6'),
    schemaFileName: 'schema_troy.json',
    dependenciesCacheFileName: 'troy.pdep',
    supportsCompression: true,
    tableGuids: true,
  },
  {
    key: 'three_kingdoms',
    displayName: 'Three Kingdoms',
    pfhVersions: uniform('PFH5'),
    schemaFileName: 'schema_3k.json',
    dependenciesCacheFileName: '3k.pdep',
    supportsCompression: false,
    tableGuids: true,
  },
  {
    key: 'warhammer_2',
    displayName: 'Warhammer II',
    pfhVersions: uniform('PFH5'),
    schemaFileName: 'schema_wh2.json',
    dependenciesCacheFileName: 'wh2.pdep',
    supportsCompression: false,
    tableGuids: true,
  },
  {
    key: 'attila',
    displayName: 'Attila',
    pfhVersions: uniform('PFH4'),
    schemaFileName: 'schema_att.json',
    dependenciesCacheFileName: 'att.pdep',
    supportsCompression: false,
    tableGuids: true,
  },
  {
    key: 'rome_2',
    displayName: 'Rome II',
    pfhVersions: uniform('PFH4'),
    schemaFileName: 'schema_rom2.json',
    dependenciesCacheFileName: 'rom2.pdep',
    supportsCompression: false,
    tableGuids: false,
  },
];

export const DEFAULT_GAME_KEY = 'warhammer_3';

export function findGame(key: string): GameInfo | undefined {
  return SUPPORTED_GAMES.find((game) => game.key === key);
}

export function gameByKey(key: string): GameInfo {
  const game = findGame(key);
  if (!game) {
    throw new ConfigError(`Unsupported game "${key}". Supported games: ${SUPPORTED_GAMES.map((entry) => entry.key).join(', ')}`);
  }
  return game;
}
