import { NoteTreeError } from '../errors.js';
import {
  CATALOG_FILE,
  FOLDER_METADATA_FILE,
  isNoteFile,
  isReservedName,
  noteFileName,
  parseCatalog,
  parseFolderMetadata,
  parseNote,
  serializeCatalog,
  serializeFolderMetadata,
  serializeNote,
} from '../storage/note-file-codec.js';
import type { Folder, FolderId, NoteId, StoredCatalog, StoredFolder, StoredNote } from '../types/index.js';
import logger from '../utils/logger.js';

export type TreeRoot = 'active' | 'trash';

/**
 * Where a mirrored entry lives: which root, then one segment per directory/file below it.
 */
export interface MirrorPath {
  root: TreeRoot;
  segments: readonly string[];
}

/**
 * Position of a folder in the tree: its root, and the folders from just below that
 * root down to the folder itself (empty for the root).
 */
export interface FolderLocation {
  root: TreeRoot;
  chain: readonly Folder[];
}

export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

export interface LoadedNote {
  path: MirrorPath;
  note: StoredNote;
}

export interface LoadedFolder {
  path: MirrorPath;
  name: string;
  metadata: StoredFolder | null;
  notes: LoadedNote[];
  folders: LoadedFolder[];
}

export interface LoadedTree {
  active: LoadedFolder;
  trash: LoadedFolder;
  catalog: StoredCatalog | null;
}

/**
 * Persistence abstraction that mirrors the folder trees.
 * Implementations may write to disk or keep a virtual layout in memory.
 * All methods are synchronous; failures surface as IOError.
 */
export interface TreeMirror {
  /**
   * Create the directory for a folder and write its metadata.
   */
  writeFolder(folder: Folder, location: FolderLocation): void;

  /**
   * Rename or move a folder's directory to match its location. Every descendant's
   * stored path is rewritten.
   */
  relocateFolder(folder: Folder, location: FolderLocation): void;

  /**
   * Remove a folder's directory and everything below it.
   */
  removeFolder(folderId: FolderId): void;

  /**
   * Write a note file into its folder's directory; a stale file at the previous
   * location is removed.
   */
  writeNote(note: StoredNote, location: FolderLocation): void;

  removeNote(noteId: NoteId): void;

  /**
   * Persist the tag table and color labels.
   */
  writeCatalog(catalog: StoredCatalog): void;

  /**
   * Walk both roots and return what was found. Unparseable notes are logged and skipped.
   */
  load(): LoadedTree;

  /**
   * Record where an entity loaded by `load()` lives.
   */
  adoptFolder(folderId: FolderId, path: MirrorPath): void;
  adoptNote(noteId: NoteId, path: MirrorPath): void;

  /**
   * Stored path of a mirrored note, if any.
   */
  notePath(noteId: NoteId): MirrorPath | undefined;
}

const TRASH_SUFFIX = /~\d+$/;

function samePath(a: MirrorPath, b: MirrorPath): boolean {
  return a.root === b.root && a.segments.length === b.segments.length && a.segments.every((s, i) => s === b.segments[i]);
}

function isWithin(path: MirrorPath, prefix: MirrorPath): boolean {
  return (
    path.root === prefix.root &&
    path.segments.length >= prefix.segments.length &&
    prefix.segments.every((s, i) => s === path.segments[i])
  );
}

function child(path: MirrorPath, name: string): MirrorPath {
  return { root: path.root, segments: [...path.segments, name] };
}

export function describePath(path: MirrorPath): string {
  return `${path.root}:/${path.segments.join('/')}`;
}

/**
 * Shared bookkeeping for mirrors: computes directory/file names from tree locations
 * and keeps the stored path of every mirrored folder and note.
 */
export abstract class PathTrackingMirror implements TreeMirror {
  private folderPaths = new Map<FolderId, MirrorPath>();
  private notePaths = new Map<NoteId, MirrorPath>();

  protected abstract makeDirectory(path: MirrorPath): void;
  protected abstract moveEntry(from: MirrorPath, to: MirrorPath): void;
  protected abstract removeEntry(path: MirrorPath): void;
  protected abstract writeText(path: MirrorPath, text: string): void;
  protected abstract readText(path: MirrorPath): string;
  protected abstract listDirectory(path: MirrorPath): DirectoryEntry[];

  writeFolder(folder: Folder, location: FolderLocation): void {
    const path = this.pathFor(location);
    this.makeDirectory(path);
    this.writeMetadata(folder, path);
    this.folderPaths.set(folder.id, path);
  }

  relocateFolder(folder: Folder, location: FolderLocation): void {
    const from = this.folderPaths.get(folder.id);
    if (!from) {
      this.writeFolder(folder, location);
      return;
    }

    const to = this.pathFor(location);
    if (!samePath(from, to)) {
      this.moveEntry(from, to);
      this.rebase(from, to);
    }
    this.writeMetadata(folder, to);
  }

  removeFolder(folderId: FolderId): void {
    const path = this.folderPaths.get(folderId);
    if (!path) return;

    this.removeEntry(path);
    for (const [id, stored] of this.folderPaths) {
      if (isWithin(stored, path)) this.folderPaths.delete(id);
    }
    for (const [id, stored] of this.notePaths) {
      if (isWithin(stored, path)) this.notePaths.delete(id);
    }
  }

  writeNote(note: StoredNote, location: FolderLocation): void {
    const to = child(this.pathFor(location), noteFileName(note.id, note.title));
    this.writeText(to, serializeNote(note));

    const from = this.notePaths.get(note.id);
    this.notePaths.set(note.id, to);
    if (from && !samePath(from, to)) {
      this.removeEntry(from);
    }
  }

  removeNote(noteId: NoteId): void {
    const path = this.notePaths.get(noteId);
    if (!path) return;
    this.removeEntry(path);
    this.notePaths.delete(noteId);
  }

  writeCatalog(catalog: StoredCatalog): void {
    this.writeText({ root: 'active', segments: [CATALOG_FILE] }, serializeCatalog(catalog));
  }

  load(): LoadedTree {
    this.folderPaths.clear();
    this.notePaths.clear();

    const activeRoot: MirrorPath = { root: 'active', segments: [] };
    const trashRoot: MirrorPath = { root: 'trash', segments: [] };
    this.makeDirectory(activeRoot);
    this.makeDirectory(trashRoot);

    return {
      active: this.loadDirectory(activeRoot, ''),
      trash: this.loadDirectory(trashRoot, ''),
      catalog: this.loadCatalog(),
    };
  }

  adoptFolder(folderId: FolderId, path: MirrorPath): void {
    this.folderPaths.set(folderId, path);
  }

  adoptNote(noteId: NoteId, path: MirrorPath): void {
    this.notePaths.set(noteId, path);
  }

  notePath(noteId: NoteId): MirrorPath | undefined {
    return this.notePaths.get(noteId);
  }

  private pathFor(location: FolderLocation): MirrorPath {
    const segments = location.chain.map((folder, depth) =>
      location.root === 'trash' && depth === 0 ? `${folder.name}~${folder.id}` : folder.name
    );
    return { root: location.root, segments };
  }

  private writeMetadata(folder: Folder, path: MirrorPath): void {
    this.writeText(
      child(path, FOLDER_METADATA_FILE),
      serializeFolderMetadata({
        id: folder.id,
        name: folder.name,
        createdAt: folder.createdAt,
        originalParentId: folder.originalParentId,
      })
    );
  }

  private rebase(from: MirrorPath, to: MirrorPath): void {
    const move = (stored: MirrorPath): MirrorPath => ({
      root: to.root,
      segments: [...to.segments, ...stored.segments.slice(from.segments.length)],
    });
    for (const [id, stored] of this.folderPaths) {
      if (isWithin(stored, from)) this.folderPaths.set(id, move(stored));
    }
    for (const [id, stored] of this.notePaths) {
      if (isWithin(stored, from)) this.notePaths.set(id, move(stored));
    }
  }

  private loadCatalog(): StoredCatalog | null {
    const catalogPath: MirrorPath = { root: 'active', segments: [CATALOG_FILE] };
    const present = this.listDirectory({ root: 'active', segments: [] }).some(
      (entry) => !entry.isDirectory && entry.name === CATALOG_FILE
    );
    if (!present) return null;
    try {
      return parseCatalog(this.readText(catalogPath), describePath(catalogPath));
    } catch (error) {
      if (!(error instanceof NoteTreeError)) throw error;
      logger.warn({ error: error.message, path: describePath(catalogPath) }, 'Ignoring unreadable catalog');
      return null;
    }
  }

  private loadDirectory(path: MirrorPath, directoryName: string): LoadedFolder {
    const entries = this.listDirectory(path);
    let metadata: StoredFolder | null = null;

    if (entries.some((entry) => !entry.isDirectory && entry.name === FOLDER_METADATA_FILE)) {
      const metadataPath = child(path, FOLDER_METADATA_FILE);
      try {
        metadata = parseFolderMetadata(this.readText(metadataPath), describePath(metadataPath));
      } catch (error) {
        if (!(error instanceof NoteTreeError)) throw error;
        logger.warn({ error: error.message, path: describePath(metadataPath) }, 'Ignoring unreadable folder metadata');
      }
    }

    // Directory names are authoritative, except directly under the trash root where
    // they carry an id suffix.
    const atTrashTop = path.root === 'trash' && path.segments.length === 1;
    const loaded: LoadedFolder = {
      path,
      name: atTrashTop ? metadata?.name ?? directoryName.replace(TRASH_SUFFIX, '') : directoryName,
      metadata,
      notes: [],
      folders: [],
    };

    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      const entryPath = child(path, entry.name);
      if (entry.isDirectory) {
        if (isReservedName(entry.name)) {
          logger.warn({ path: describePath(entryPath) }, 'Skipping directory with a reserved name');
          continue;
        }
        loaded.folders.push(this.loadDirectory(entryPath, entry.name));
        continue;
      }
      if (!isNoteFile(entry.name)) {
        continue;
      }
      try {
        loaded.notes.push({ path: entryPath, note: parseNote(this.readText(entryPath), describePath(entryPath)) });
      } catch (error) {
        if (!(error instanceof NoteTreeError)) throw error;
        logger.warn({ error: error.message, code: error.code, path: describePath(entryPath) }, 'Skipping note file');
      }
    }

    // Ids follow creation order, which is the closest thing to insertion order on disk.
    loaded.notes.sort((a, b) => a.note.id - b.note.id);
    loaded.folders.sort(
      (a, b) => (a.metadata?.id ?? Number.MAX_SAFE_INTEGER) - (b.metadata?.id ?? Number.MAX_SAFE_INTEGER)
    );
    return loaded;
  }
}
