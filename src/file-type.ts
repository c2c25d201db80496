/**
 * Classifies container entries: path conventions first, then magic bytes, then
 * the extension.
 */
import type { FileType } from './types/rfile.js';

export type TextFormat = 'Plain' | 'Markdown' | 'Lua' | 'Xml' | 'Json' | 'Html' | 'Css' | 'Js' | 'Yaml' | 'Csv';

const TEXT_EXTENSIONS: ReadonlyMap<string, TextFormat> = new Map([
  ['.txt', 'Plain'],
  ['.inl', 'Plain'],
  ['.bob', 'Plain'],
  ['.md', 'Markdown'],
  ['.lua', 'Lua'],
  ['.xml', 'Xml'],
  ['.xml.shader', 'Xml'],
  ['.xml.material', 'Xml'],
  ['.variantmeshdefinition', 'Xml'],
  ['.wsmodel', 'Xml'],
  ['.environment', 'Xml'],
  ['.json', 'Json'],
  ['.html', 'Html'],
  ['.htm', 'Html'],
  ['.css', 'Css'],
  ['.js', 'Js'],
  ['.yml', 'Yaml'],
  ['.yaml', 'Yaml'],
  ['.csv', 'Csv'],
  ['.tsv', 'Csv'],
]);

const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.tga', '.dds', '.gif']);
const AUDIO_EXTENSIONS = new Set(['.wem', '.bnk', '.ogg', '.wav', '.mp3']);
const VIDEO_EXTENSIONS = new Set(['.ca_vp8', '.ivf']);
const RIGID_MODEL_EXTENSIONS = new Set(['.rigid_model_v2']);
const ESF_EXTENSIONS = new Set(['.esf', '.ccd', '.save']);

const DB_PATH = /^db\/[^/]+\/[^/]+$/i;
const ANIMS_TABLE_PATH = /^animations\/animation_tables\/[^/]+\.bin$/i;
const MATCHED_COMBAT_PATH = /^animations\/matched_combat\/[^/]+\.bin$/i;
const UI_PATH = /^ui\/(.+\/)?[^/.]+$/i;

export const ESF_SIGNATURES: ReadonlySet<number> = new Set([0xabca, 0xabcb, 0xabce, 0xabcf]);

/** Normalises a container path: forward slashes, no leading slash. */
export function normalizePath(path: string): string {
  return path.replace(/\\/g, '/').replace(/\/{2,}/g, '/').replace(/^\/+/, '').replace(/\/+$/, '');
}

export function fileName(path: string): string {
  const normalized = normalizePath(path);
  return normalized.slice(normalized.lastIndexOf('/') + 1);
}

/**
 * Lower-cased extension of a file name; compound extensions known to the
 * text table (`.xml.shader`) are returned whole.
 */
export function extensionOf(path: string): string {
  const name = fileName(path).toLowerCase();
  for (const extension of TEXT_EXTENSIONS.keys()) {
    if (extension.split('.').length > 2 && name.endsWith(extension)) {
      return extension;
    }
  }
  const dot = name.lastIndexOf('.');
  return dot <= 0 ? '' : name.slice(dot);
}

/** Table name of a DB entry path (`db/<table>/<file>`), if it is one. */
export function tableNameFromPath(path: string): string | null {
  const normalized = normalizePath(path);
  if (!DB_PATH.test(normalized)) {
    return null;
  }
  return normalized.split('/')[1] ?? null;
}

export function textFormatOf(path: string): TextFormat {
  return TEXT_EXTENSIONS.get(extensionOf(path)) ?? 'Plain';
}

function startsWith(bytes: Buffer, magic: string | readonly number[]): boolean {
  const expected = typeof magic === 'string' ? Buffer.from(magic, 'latin1') : Buffer.from(magic);
  return bytes.length >= expected.length && bytes.subarray(0, expected.length).equals(expected);
}

function classifyByMagic(bytes: Buffer): FileType | null {
  if (startsWith(bytes, [0xff, 0xfe, 0x4c, 0x4f, 0x43, 0x00])) return 'Loc';
  if (startsWith(bytes, 'VRNT')) return 'UnitVariant';
  if (startsWith(bytes, 'RMV2')) return 'RigidModel';
  if (startsWith(bytes, 'CAMV') || startsWith(bytes, 'DKIF')) return 'Video';
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47]) || startsWith(bytes, 'DDS ') || startsWith(bytes, [0xff, 0xd8, 0xff])) return 'Image';
  if (startsWith(bytes, 'RIFF')) return 'Audio';
  if (bytes.length >= 10 && /^Version\d{3}$/.test(bytes.toString('latin1', 0, 10))) return 'UIC';
  if (bytes.length >= 4 && ESF_SIGNATURES.has(bytes.readUInt32LE(0))) return 'ESF';
  return null;
}

function classifyByExtension(path: string): FileType {
  const extension = extensionOf(path);
  const name = fileName(path).toLowerCase();
  if (extension === '.loc') return 'Loc';
  if (extension === '.animpack') return 'AnimPack';
  if (extension === '.frg') return 'AnimFragment';
  if (extension === '.unit_variant') return 'UnitVariant';
  if (extension === '.bin' && name.startsWith('portrait_settings')) return 'PortraitSettings';
  if (extension === '.uic') return 'UIC';
  if (ESF_EXTENSIONS.has(extension)) return 'ESF';
  if (IMAGE_EXTENSIONS.has(extension)) return 'Image';
  if (AUDIO_EXTENSIONS.has(extension)) return 'Audio';
  if (VIDEO_EXTENSIONS.has(extension)) return 'Video';
  if (RIGID_MODEL_EXTENSIONS.has(extension)) return 'RigidModel';
  if (TEXT_EXTENSIONS.has(extension)) return 'Text';
  return 'Unknown';
}

/**
 * Decides the file type of an entry. `bytes`, when given, lets the magic of
 * the payload override a misleading extension.
 */
export function classifyFile(path: string, bytes?: Buffer): FileType {
  const normalized = normalizePath(path);
  if (DB_PATH.test(normalized)) return 'DB';
  if (ANIMS_TABLE_PATH.test(normalized)) return 'AnimsTable';
  if (MATCHED_COMBAT_PATH.test(normalized)) return 'MatchedCombat';

  const byExtension = classifyByExtension(normalized);
  if (bytes) {
    const byMagic = classifyByMagic(bytes);
    if (byMagic) {
      return byMagic;
    }
  }
  if (byExtension === 'Unknown' && UI_PATH.test(normalized)) {
    return 'UIC';
  }
  return byExtension;
}
