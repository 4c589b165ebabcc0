import { IOError } from '../errors.js';
import { PathTrackingMirror, describePath, type DirectoryEntry, type MirrorPath, type TreeRoot } from './tree-mirror.js';

const DIRECTORY = Symbol('directory');
type Entry = string | typeof DIRECTORY;

function keyOf(path: MirrorPath): string {
  return [path.root, ...path.segments].join('/');
}

/**
 * In-memory TreeMirror.
 * Keeps a virtual directory layout so the mirrored shape can be inspected without a disk.
 */
export class MemoryTreeMirror extends PathTrackingMirror {
  private entries = new Map<string, Entry>();

  /**
   * Relative paths of every file under a root, sorted.
   */
  files(root: TreeRoot): string[] {
    return this.keysUnder(root)
      .filter((key) => this.entries.get(key) !== DIRECTORY)
      .map((key) => key.slice(root.length + 1))
      .sort();
  }

  /**
   * Relative paths of every directory under a root, sorted.
   */
  directories(root: TreeRoot): string[] {
    return this.keysUnder(root)
      .filter((key) => this.entries.get(key) === DIRECTORY)
      .map((key) => key.slice(root.length + 1))
      .sort();
  }

  readFile(root: TreeRoot, relativePath: string): string | undefined {
    const entry = this.entries.get(`${root}/${relativePath}`);
    return typeof entry === 'string' ? entry : undefined;
  }

  protected makeDirectory(path: MirrorPath): void {
    const segments: string[] = [];
    for (const segment of path.segments) {
      segments.push(segment);
      this.entries.set(keyOf({ root: path.root, segments }), DIRECTORY);
    }
    if (path.segments.length === 0) {
      this.entries.set(path.root, DIRECTORY);
    }
  }

  protected moveEntry(from: MirrorPath, to: MirrorPath): void {
    const source = keyOf(from);
    if (!this.entries.has(source)) {
      throw new IOError('move', describePath(from), 'no such entry');
    }
    this.makeDirectory({ root: to.root, segments: to.segments.slice(0, -1) });
    const target = keyOf(to);
    for (const [key, entry] of Array.from(this.entries)) {
      if (key === source || key.startsWith(`${source}/`)) {
        this.entries.delete(key);
        this.entries.set(target + key.slice(source.length), entry);
      }
    }
  }

  protected removeEntry(path: MirrorPath): void {
    const target = keyOf(path);
    for (const key of Array.from(this.entries.keys())) {
      if (key === target || key.startsWith(`${target}/`)) {
        this.entries.delete(key);
      }
    }
  }

  protected writeText(path: MirrorPath, text: string): void {
    this.makeDirectory({ root: path.root, segments: path.segments.slice(0, -1) });
    this.entries.set(keyOf(path), text);
  }

  protected readText(path: MirrorPath): string {
    const entry = this.entries.get(keyOf(path));
    if (typeof entry !== 'string') {
      throw new IOError('read', describePath(path), 'no such file');
    }
    return entry;
  }

  protected listDirectory(path: MirrorPath): DirectoryEntry[] {
    const prefix = `${keyOf(path)}/`;
    const result: DirectoryEntry[] = [];
    for (const [key, entry] of this.entries) {
      if (key.startsWith(prefix) && !key.slice(prefix.length).includes('/')) {
        result.push({ name: key.slice(prefix.length), isDirectory: entry === DIRECTORY });
      }
    }
    return result;
  }

  private keysUnder(root: TreeRoot): string[] {
    return Array.from(this.entries.keys()).filter((key) => key.startsWith(`${root}/`));
  }
}
