/**
 * Binary constants of the pack container format.
 */

export const PFH_VERSIONS = ['PFH4', 'PFH5', 'PFH6'] as const;
export type PfhVersion = (typeof PFH_VERSIONS)[number];

export const PACK_FILE_TYPES = ['Boot', 'Release', 'Patch', 'Mod', 'Movie'] as const;
export type PackFileType = (typeof PACK_FILE_TYPES)[number];

/** Header sizes in bytes, per format version. */
export const HEADER_SIZES: Readonly<Record<PfhVersion, number>> = {
  PFH4: 28,
  PFH5: 32,
  PFH6: 300,
};

export const FILE_TYPE_MASK = 0x000f;

export const PackFlags = {
  DATA_IS_ENCRYPTED: 0x0010,
  INDEX_HAS_TIMESTAMPS: 0x0040,
  INDEX_IS_ENCRYPTED: 0x0080,
  DATA_IS_COMPRESSED: 0x0200,
} as const;

export const KNOWN_FLAGS_MASK = Object.values(PackFlags).reduce((mask, flag) => mask | flag, 0);

export const AUTHORING_TOOL_SIZE = 8;
export const PFH6_RESERVED_SIZE = 256;

/** Entries holding pack metadata, hidden from the file listing. */
export const RESERVED_NOTES_PATH = 'notes.pack_reserved';
export const RESERVED_SETTINGS_PATH = 'settings.pack_reserved';
export const RESERVED_PATHS: ReadonlySet<string> = new Set([RESERVED_NOTES_PATH, RESERVED_SETTINGS_PATH]);

/** Pack types a game ships; they are read-only unless explicitly allowed. */
export const CA_PACK_TYPES: ReadonlySet<PackFileType> = new Set<PackFileType>(['Boot', 'Release', 'Patch']);
