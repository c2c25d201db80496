/**
 * Pack optimizer: drops whatever the pack repeats from the layers below it.
 */
import type { Dependencies, DependencyLayers, LayerTable } from './dependencies.js';
import { describeError } from './errors.js';
import { LOC_TABLE_NAME } from './files/loc.js';
import type { Pack } from './pack.js';
import type { Schema } from './schema.js';
import { rowKey } from './table.js';
import type { DecodedFile } from './types/decoded.js';
import { debug, info } from './utils/logger.js';

export interface OptimizeOptions {
  /** Also optimize tables whose path overwrites a table of a lower layer. */
  readonly optimizeNotRenamed?: boolean;
  readonly schema?: Schema | null;
}

function lowerTables(layers: DependencyLayers, tableName: string): LayerTable[] {
  return [
    ...layers.tables('ParentFiles', tableName),
    ...layers.tables('GameFiles', tableName),
    ...layers.tables('AssKitFiles', tableName),
  ];
}

/**
 * Removes table rows identical to a row of the same table version in a lower
 * layer, then deletes tables left empty and other files byte-identical to the
 * lower-layer file at the same path.
 *
 * @returns The deleted paths
 */
export async function optimizePack(pack: Pack, dependencies: Dependencies, { optimizeNotRenamed = false, schema = null }: OptimizeOptions = {}): Promise<string[]> {
  return dependencies.read(async (layers) => {
    const deleted: string[] = [];
    let rowsRemoved = 0;

    for (const file of pack.files()) {
      const lower = layers.lowerLayerFile(file.path);

      if (file.fileType === 'DB' || file.fileType === 'Loc') {
        if (lower && !optimizeNotRenamed) {
          continue;
        }
        let decoded: DecodedFile;
        try {
          decoded = await file.decode({ schema: schema ?? layers.schema ?? undefined });
        } catch (error) {
          debug(`Optimizer skips ${file.path}: ${describeError(error)}`);
          continue;
        }
        if (decoded.type !== 'DB' && decoded.type !== 'Loc') {
          continue;
        }
        const tableName = decoded.type === 'DB' ? decoded.tableName : LOC_TABLE_NAME;
        const version = decoded.definition.version;
        const known = new Set(lowerTables(layers, tableName)
          .filter(({ table }) => table.definition.version === version)
          .flatMap(({ table }) => table.rows.map(rowKey)));
        const kept = decoded.rows.filter((row) => !known.has(rowKey(row)));
        if (kept.length !== decoded.rows.length) {
          rowsRemoved += decoded.rows.length - kept.length;
          decoded.rows.splice(0, decoded.rows.length, ...kept);
          file.markEdited();
        }
        if (decoded.rows.length === 0) {
          pack.remove(file.path);
          deleted.push(file.path);
        }
        continue;
      }

      if (lower) {
        const [ours, theirs] = await Promise.all([file.encode(), lower.file.encode()]);
        if (ours.equals(theirs)) {
          pack.remove(file.path);
          deleted.push(file.path);
        }
      }
    }

    info(`✅ Optimized ${pack.name}: ${rowsRemoved} rows removed, ${deleted.length} files deleted`);
    return deleted;
  });
}
