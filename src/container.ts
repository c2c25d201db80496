/**
 * Path-indexed entry storage shared by packs and animpacks. Paths are unique
 * case-insensitively and keep the case they were inserted with.
 */
import { ConflictError } from './errors.js';
import { normalizePath } from './file-type.js';
import type { RFile } from './rfile.js';
import type { FileType } from './types/rfile.js';

function pathKey(path: string): string {
  return normalizePath(path).toLowerCase();
}

function folderPrefix(folder: string): string {
  const normalized = pathKey(folder);
  return normalized === '' ? '' : `${normalized}/`;
}

export interface MovedPath {
  readonly from: string;
  readonly to: string;
}

export abstract class Container {
  protected readonly entries = new Map<string, RFile>();

  /** Entries sorted by lower-cased path. */
  files(): RFile[] {
    return [...this.entries.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, file]) => file);
  }

  paths(): string[] {
    return this.files().map((file) => file.path);
  }

  get size(): number {
    return this.entries.size;
  }

  get(path: string): RFile | undefined {
    return this.entries.get(pathKey(path));
  }

  hasFile(path: string): boolean {
    return this.entries.has(pathKey(path));
  }

  hasFolder(folder: string): boolean {
    const prefix = folderPrefix(folder);
    if (prefix === '') {
      return this.entries.size > 0;
    }
    for (const key of this.entries.keys()) {
      if (key.startsWith(prefix)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Adds an entry. Returns the entry it replaced, if any.
   * @throws {ConflictError} If the path is taken and `replace` is false
   */
  insert(file: RFile, { replace = true }: { replace?: boolean } = {}): RFile | undefined {
    const key = pathKey(file.path);
    const existing = this.entries.get(key);
    if (existing && !replace) {
      throw new ConflictError(`${file.path} already exists`);
    }
    this.entries.set(key, file);
    return existing;
  }

  /** Removes a file, or every file under a folder. Returns the removed entries. */
  remove(path: string): RFile[] {
    const file = this.entries.get(pathKey(path));
    if (file) {
      this.entries.delete(pathKey(path));
      return [file];
    }
    const removed = this.filesInFolder(path);
    for (const entry of removed) {
      this.entries.delete(pathKey(entry.path));
    }
    return removed;
  }

  filesInFolder(folder: string): RFile[] {
    const prefix = folderPrefix(folder);
    return this.files().filter((file) => pathKey(file.path).startsWith(prefix));
  }

  /**
   * Moves a file, or a folder with everything under it.
   * @throws {ConflictError} If nothing exists at `from` or a target path is taken; nothing is moved
   */
  move(from: string, to: string): MovedPath[] {
    const source = this.get(from);
    const target = normalizePath(to);
    const moves: Array<{ file: RFile; to: string }> = source
      ? [{ file: source, to: target }]
      : this.filesInFolder(from).map((file) => ({ file, to: `${target}${file.path.slice(normalizePath(from).length)}` }));
    if (moves.length === 0) {
      throw new ConflictError(`Nothing to move at ${from}`);
    }

    const moving = new Set(moves.map((move) => pathKey(move.file.path)));
    for (const move of moves) {
      const key = pathKey(move.to);
      if (this.entries.has(key) && !moving.has(key)) {
        throw new ConflictError(`Cannot move ${move.file.path} to ${move.to}: the destination exists`);
      }
    }

    const result: MovedPath[] = [];
    for (const move of moves) {
      this.entries.delete(pathKey(move.file.path));
    }
    for (const move of moves) {
      result.push({ from: move.file.path, to: move.to });
      move.file.setPath(move.to);
      this.entries.set(pathKey(move.to), move.file);
    }
    return result;
  }

  /** Files named by `paths`, each a file or a folder, without duplicates. */
  filesByPath(paths: readonly string[]): RFile[] {
    const found = new Map<string, RFile>();
    for (const path of paths) {
      const file = this.get(path);
      const matches = file ? [file] : this.filesInFolder(path);
      for (const match of matches) {
        found.set(pathKey(match.path), match);
      }
    }
    return [...found.values()];
  }

  filesByType(types: readonly FileType[]): RFile[] {
    return this.files().filter((file) => types.includes(file.fileType));
  }
}
