/**
 * Types shared by the per-file codecs and the RFile dispatch.
 */
import type { GameInfo } from '../games.js';
import type { Schema } from '../schema.js';

export const FILE_TYPES = [
  'DB',
  'Loc',
  'AnimFragment',
  'AnimPack',
  'AnimsTable',
  'PortraitSettings',
  'UnitVariant',
  'ESF',
  'MatchedCombat',
  'UIC',
  'Image',
  'Audio',
  'Video',
  'RigidModel',
  'Text',
  'Unknown',
] as const;

export type FileType = (typeof FILE_TYPES)[number];

export interface DecodeContext {
  readonly schema?: Schema;
  /** Active game, for format quirks. */
  readonly game?: GameInfo;
  /** Nested containers keep their entries lazy when set. */
  readonly lazyLoad?: boolean;
  /** Path of the entry inside its container. */
  readonly path?: string;
}

export type EncodeContext = DecodeContext;

/** Where a lazily loaded entry's bytes live on disk. */
export interface OnDiskSource {
  readonly filePath: string;
  readonly offset: number;
  /** Bytes occupied in the container. */
  readonly storedSize: number;
  readonly uncompressedSize: number;
  readonly compressed: boolean;
  readonly encrypted: boolean;
}

/** Entry metadata, as listed to callers. */
export interface RFileInfo {
  readonly path: string;
  readonly fileType: FileType;
  /** Raw size in bytes; null while only an edited decoded value exists. */
  readonly size: number | null;
  readonly timestamp: number | null;
  readonly isLoaded: boolean;
  readonly isDecoded: boolean;
  /** Bytes kept as stored because they could not be unpacked. */
  readonly isOpaque: boolean;
}
