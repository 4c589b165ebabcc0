import { cpSync, mkdirSync, readdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

import { IOError, errorMessage } from '../errors.js';
import { PathTrackingMirror, type DirectoryEntry, type MirrorPath } from './tree-mirror.js';

/**
 * Disk-backed TreeMirror.
 * Active folders live under `basePath`, trashed ones under `trashPath`.
 */
export class DiskTreeMirror extends PathTrackingMirror {
  private readonly activeRoot: string;
  private readonly trashRoot: string;

  constructor(basePath: string, trashPath: string) {
    super();
    this.activeRoot = resolve(basePath);
    this.trashRoot = resolve(trashPath);
  }

  get basePath(): string {
    return this.activeRoot;
  }

  /**
   * Absolute filesystem path for a mirrored entry.
   */
  resolvePath(path: MirrorPath): string {
    const root = path.root === 'active' ? this.activeRoot : this.trashRoot;
    return join(root, ...path.segments);
  }

  protected makeDirectory(path: MirrorPath): void {
    const target = this.resolvePath(path);
    this.io('create directory', target, () => mkdirSync(target, { recursive: true }));
  }

  protected moveEntry(from: MirrorPath, to: MirrorPath): void {
    const source = this.resolvePath(from);
    const target = this.resolvePath(to);
    this.io('move', source, () => {
      mkdirSync(dirname(target), { recursive: true });
      try {
        renameSync(source, target);
      } catch (error) {
        // Data and trash roots may sit on different devices.
        if ((error as NodeJS.ErrnoException).code !== 'EXDEV') throw error;
        cpSync(source, target, { recursive: true });
        rmSync(source, { recursive: true, force: true });
      }
    });
  }

  protected removeEntry(path: MirrorPath): void {
    const target = this.resolvePath(path);
    this.io('remove', target, () => rmSync(target, { recursive: true, force: true }));
  }

  protected writeText(path: MirrorPath, text: string): void {
    const target = this.resolvePath(path);
    this.io('write', target, () => {
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, text, 'utf-8');
    });
  }

  protected readText(path: MirrorPath): string {
    const target = this.resolvePath(path);
    return this.io('read', target, () => readFileSync(target, 'utf-8'));
  }

  protected listDirectory(path: MirrorPath): DirectoryEntry[] {
    const target = this.resolvePath(path);
    return this.io('list', target, () =>
      readdirSync(target, { withFileTypes: true }).map((entry) => ({
        name: entry.name,
        isDirectory: entry.isDirectory(),
      }))
    );
  }

  private io<T>(operation: string, target: string, action: () => T): T {
    try {
      return action();
    } catch (error) {
      throw new IOError(operation, target, errorMessage(error));
    }
  }
}
