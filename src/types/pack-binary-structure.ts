/**
 * Parsed header and index of a pack file.
 */
import type { PackFileType, PfhVersion } from '../constants/pack-constants.js';

export interface PackHeader {
  readonly pfhVersion: PfhVersion;
  readonly fileType: PackFileType;
  /** Header flags without the file type nibble, unknown bits included. */
  readonly bitmask: number;
  readonly timestamp: number;
  /** PFH5 and later. */
  readonly gameVersion: number;
  /** PFH6 only. */
  readonly buildNumber: number;
  /** PFH6 only, at most 8 ASCII characters. */
  readonly authoringTool: string;
}

export interface PackIndexEntry {
  readonly path: string;
  /** Unpacked size. */
  readonly size: number;
  /** Bytes occupied in the payload section. */
  readonly storedSize: number;
  readonly timestamp: number | null;
  /** Absolute offset of the stored bytes. */
  readonly offset: number;
}

export interface PackBinaryStructure {
  readonly filePath: string;
  readonly header: PackHeader;
  readonly dependencies: string[];
  readonly entries: PackIndexEntry[];
  /** Whole file contents; null when read lazily. */
  readonly buffer: Buffer | null;
  readonly totalSize: number;
}

/** One entry as handed to the writer, already compressed and encrypted as the flags require. */
export interface PackWriteEntry {
  readonly path: string;
  readonly size: number;
  readonly timestamp: number | null;
  readonly stored: Buffer;
}
