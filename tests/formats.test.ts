import { describe, it, expect } from 'vitest';
import { DecodeError } from '../src/errors.js';
import { classifyFile, extensionOf, tableNameFromPath } from '../src/file-type.js';
import { AnimFragment } from '../src/files/anim-fragment.js';
import { AnimPack } from '../src/files/animpack.js';
import { AnimsTable } from '../src/files/anims-table.js';
import { ESF, UIC } from '../src/files/opaque-tail.js';
import { PortraitSettings } from '../src/files/portrait-settings.js';
import { Text } from '../src/files/text.js';
import { UnitVariant } from '../src/files/unit-variant.js';
import { RFile } from '../src/rfile.js';
import { BinaryWriter } from '../src/utils/binary-writer.js';

function fragment(): AnimFragment {
  return new AnimFragment('humanoid01', 'humanoid01', 0, 10, [
    {
      animationId: 3,
      slotId: 7,
      filename: 'animations/battle/idle.anim',
      metadata: 'animations/battle/idle.meta',
      metadataSound: '',
      skeletonType: 'humanoid01',
      blendInTime: 0.25,
      selectionWeight: 1,
      singleFrameVariant: false,
    },
  ]);
}

describe('Text', () => {
  it('should keep a UTF-8 byte order mark', () => {
    const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('hi', 'utf8')]);

    const text = Text.decode(bytes, 'text/readme.md');

    expect(text.encoding).toBe('Utf8Bom');
    expect(text.format).toBe('Markdown');
    expect(text.contents).toBe('hi');
    expect(text.encode()).toEqual(bytes);
  });

  it('should read UTF-16LE with a byte order mark', () => {
    const bytes = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from('hi', 'utf16le')]);

    const text = Text.decode(bytes);

    expect(text.encoding).toBe('Utf16Le');
    expect(text.contents).toBe('hi');
    expect(text.encode()).toEqual(bytes);
  });

  it('should fall back to latin1 for invalid UTF-8', () => {
    const bytes = Buffer.from([0x63, 0x61, 0x66, 0xe9]);

    const text = Text.decode(bytes, 'script/names.lua');

    expect(text.encoding).toBe('Iso8859_1');
    expect(text.format).toBe('Lua');
    expect(text.contents).toBe('café');
    expect(text.encode()).toEqual(bytes);
  });
});

describe('structured formats', () => {
  it('should round-trip an animation fragment with trailing bytes', () => {
    const bytes = Buffer.concat([fragment().encode(), Buffer.from([0xaa, 0xbb])]);

    const decoded = AnimFragment.decode(bytes);

    expect(decoded.entries).toEqual(fragment().entries);
    expect(decoded.tail).toEqual(Buffer.from([0xaa, 0xbb]));
    expect(decoded.encode()).toEqual(bytes);
  });

  it('should reject an unsupported fragment version', () => {
    const writer = new BinaryWriter();
    writer.writeI32(9);

    expect(() => AnimFragment.decode(writer.toBuffer(), 'animations/x.frg')).toThrow('Unsupported animation fragment version 9');
  });

  it('should expose and edit fragment text fields', () => {
    const decoded = fragment();

    expect(decoded.textFields().map((field) => field.field)).toEqual(['filename', 'metadata', 'metadataSound', 'skeletonType']);
    expect(decoded.setTextField(0, 'skeletonType', 'humanoid02')).toBe(true);
    expect(decoded.setTextField(0, 'blendInTime', 'x')).toBe(false);
    expect(decoded.setTextField(4, 'filename', 'x')).toBe(false);
    expect(decoded.entries[0]?.skeletonType).toBe('humanoid02');
  });

  it('should round-trip an animation table', () => {
    const table = new AnimsTable([
      { tableName: 'hu1_sword', skeletonType: 'humanoid01', mountTableName: '', fragments: [{ name: 'hu1_sword_fragment', unknown: -1 }], unknown: true },
    ]);

    const decoded = AnimsTable.decode(table.encode());

    expect(decoded.entries).toEqual(table.entries);
    expect(decoded.encode()).toEqual(table.encode());
  });

  it('should round-trip a unit variant', () => {
    const variant = new UnitVariant(0, [
      { name: 'head', id: 5n, meshes: [{ variantFilename: 'variants/head_01.variantmeshdefinition', unknown: false }] },
    ]);
    const bytes = variant.encode();

    const decoded = UnitVariant.decode(bytes);

    expect(bytes.toString('latin1', 0, 4)).toBe('VRNT');
    expect(decoded.categories).toEqual(variant.categories);
    expect(decoded.textFields()).toEqual([
      { entry: 0, field: 'name', contents: 'head' },
      { entry: 0, field: 'meshes[0].variantFilename', contents: 'variants/head_01.variantmeshdefinition' },
    ]);
  });

  it('should round-trip version 4 portrait settings', () => {
    const camera = { z: 0, y: 1.5, yaw: 0, pitch: 0.5, fov: 30, skeletonNode: 0, distance: 2, theta: 0 };
    const settings = new PortraitSettings(4, [
      {
        id: 'wh_main_emp_karl',
        cameraHead: camera,
        cameraBody: null,
        variants: [{ filename: 'karl', fileDiffuse: 'karl_d.png', fileMask1: 'm1.png', fileMask2: '', fileMask3: '', age: 40, politician: true, factionLeader: true }],
      },
    ]);

    const decoded = PortraitSettings.decode(settings.encode(), 'ui/portraits/portrait_settings_emp.bin');

    expect(decoded.entries).toEqual(settings.entries);
    expect(decoded.setTextField(0, 'variants[0].fileMask1', 'm2.png')).toBe(true);
    expect(decoded.setTextField(0, 'variants[1].fileMask1', 'm2.png')).toBe(false);
    expect(decoded.entries[0]?.variants[0]?.fileMask1).toBe('m2.png');
  });

  it('should keep everything after a UI component header', () => {
    const bytes = Buffer.concat([Buffer.from('Version102', 'latin1'), Buffer.from([1, 2, 3])]);

    const decoded = UIC.decode(bytes);

    expect(decoded.version).toBe(102);
    expect(decoded.encode()).toEqual(bytes);
  });

  it('should reject an unknown ESF signature', () => {
    expect(() => ESF.decode(Buffer.from([0, 0, 0, 0]))).toThrow(DecodeError);
  });
});

describe('AnimPack', () => {
  function animPackBytes(): Buffer {
    const animPack = new AnimPack();
    animPack.insert(RFile.fromBytes('animations/hu1.frg', fragment().encode()));
    animPack.insert(RFile.fromBytes('animations/readme.txt', Buffer.from('notes')));
    return animPack.encode();
  }

  it('should decode its nested entries', () => {
    const bytes = animPackBytes();

    const decoded = AnimPack.decode(bytes);
    const nested = decoded.get('animations/hu1.frg');

    expect(decoded.paths()).toEqual(['animations/hu1.frg', 'animations/readme.txt']);
    expect(nested?.fileType).toBe('AnimFragment');
    expect(nested?.isDecoded).toBe(true);
    expect(decoded.encode()).toEqual(bytes);
  });

  it('should leave nested entries raw when loading lazily', () => {
    const decoded = AnimPack.decode(animPackBytes(), { lazyLoad: true });

    expect(decoded.get('animations/hu1.frg')?.isDecoded).toBe(false);
  });

  it('should decode as a pack entry', async () => {
    const file = RFile.fromBytes('animations/campaign.animpack', animPackBytes());

    const decoded = await file.decode();

    expect(decoded.type).toBe('AnimPack');
    expect(decoded.type === 'AnimPack' ? decoded.size : 0).toBe(2);
  });

  it('should write entry paths back as they were stored', () => {
    const stored = (paths: readonly string[]): Buffer => {
      const writer = new BinaryWriter();
      writer.writeU32(paths.length);
      for (const path of paths) {
        writer.writeStringU8(path);
        writer.writeU32(1);
        writer.writeBytes(Buffer.from('x'));
      }
      return writer.toBuffer();
    };
    const bytes = stored(['animations\\Hu1.txt', '/notes//readme.txt']);

    const decoded = AnimPack.decode(bytes);

    expect(decoded.get('animations/hu1.txt')?.path).toBe('animations/Hu1.txt');
    expect(decoded.encode()).toEqual(bytes);
    expect(decoded.clone().encode()).toEqual(bytes);
    decoded.move('animations/Hu1.txt', 'animations/Hu2.txt');
    expect(decoded.encode()).toEqual(stored(['/notes//readme.txt', 'animations/Hu2.txt']));
  });

  it('should reject duplicate paths', () => {
    const writer = new BinaryWriter();
    writer.writeU32(2);
    for (const path of ['a.txt', 'A.txt']) {
      writer.writeStringU8(path);
      writer.writeU32(1);
      writer.writeBytes(Buffer.from('x'));
    }

    expect(() => AnimPack.decode(writer.toBuffer())).toThrow('Duplicate path A.txt in animpack');
  });
});

describe('classifyFile', () => {
  it('should classify by path convention', () => {
    expect(classifyFile('db/units_tables/data__')).toBe('DB');
    expect(classifyFile('animations/animation_tables/animation_tables.bin')).toBe('AnimsTable');
    expect(classifyFile('animations/matched_combat/attila_generated.bin')).toBe('MatchedCombat');
  });

  it('should classify by extension', () => {
    expect(classifyFile('text/db/units.loc')).toBe('Loc');
    expect(classifyFile('variants/archer.unit_variant')).toBe('UnitVariant');
    expect(classifyFile('ui/portraits/portrait_settings_emp.bin')).toBe('PortraitSettings');
    expect(classifyFile('ui/skins/default/icon.png')).toBe('Image');
    expect(classifyFile('shaders/water.xml.shader')).toBe('Text');
    expect(classifyFile('ui/templates/button')).toBe('UIC');
    expect(classifyFile('models/thing.bin')).toBe('Unknown');
  });

  it('should let magic bytes override the extension', () => {
    expect(classifyFile('misc/mislabelled.txt', Buffer.from('VRNT\x02\x00\x00\x00', 'latin1'))).toBe('UnitVariant');
  });

  it('should read table names and compound extensions', () => {
    expect(tableNameFromPath('\\db\\units_tables\\data__')).toBe('units_tables');
    expect(tableNameFromPath('db/units_tables/nested/data__')).toBeNull();
    expect(extensionOf('shaders/water.xml.shader')).toBe('.xml.shader');
  });
});
