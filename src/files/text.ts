/**
 * Plain-text entries, re-encoded with the encoding they were read with.
 */
import { textFormatOf, type TextFormat } from '../file-type.js';

export type TextEncoding = 'Utf8' | 'Utf8Bom' | 'Utf16Le' | 'Iso8859_1';

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);
const UTF16LE_BOM = Buffer.from([0xff, 0xfe]);
const strictUtf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function isUtf8(data: Buffer): boolean {
  try {
    strictUtf8.decode(data);
    return true;
  } catch {
    return false;
  }
}

function detectEncoding(data: Buffer): TextEncoding {
  if (data.subarray(0, 3).equals(UTF8_BOM) && isUtf8(data.subarray(3))) {
    return 'Utf8Bom';
  }
  if (data.subarray(0, 2).equals(UTF16LE_BOM) && data.length % 2 === 0) {
    return 'Utf16Le';
  }
  return isUtf8(data) ? 'Utf8' : 'Iso8859_1';
}

export class Text {
  readonly type = 'Text';

  constructor(
    public contents: string,
    public encoding: TextEncoding = 'Utf8',
    public format: TextFormat = 'Plain',
  ) {}

  static decode(data: Buffer, path?: string): Text {
    const encoding = detectEncoding(data);
    const format = path ? textFormatOf(path) : 'Plain';
    switch (encoding) {
      case 'Utf8Bom': return new Text(data.subarray(3).toString('utf8'), encoding, format);
      case 'Utf16Le': return new Text(data.subarray(2).toString('utf16le'), encoding, format);
      case 'Utf8': return new Text(data.toString('utf8'), encoding, format);
      case 'Iso8859_1': return new Text(data.toString('latin1'), encoding, format);
    }
  }

  encode(): Buffer {
    switch (this.encoding) {
      case 'Utf8Bom': return Buffer.concat([UTF8_BOM, Buffer.from(this.contents, 'utf8')]);
      case 'Utf16Le': return Buffer.concat([UTF16LE_BOM, Buffer.from(this.contents, 'utf16le')]);
      case 'Utf8': return Buffer.from(this.contents, 'utf8');
      case 'Iso8859_1': return Buffer.from(this.contents, 'latin1');
    }
  }

  clone(): Text {
    return new Text(this.contents, this.encoding, this.format);
  }
}
