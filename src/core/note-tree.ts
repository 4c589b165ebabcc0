import { readFileSync, writeFileSync } from 'node:fs';
import { basename, extname } from 'node:path';

import {
  CycleError,
  DecryptionError,
  DuplicateNameError,
  IOError,
  IndexOutOfRangeError,
  InvalidNameError,
  InvalidOperationError,
  NotFoundError,
  OriginalParentGoneError,
  errorMessage,
} from '../errors.js';
import { renderHtml, renderJson, renderMarkdown } from '../export/formatters.js';
import { DiskTreeMirror } from '../repositories/disk-tree-mirror.js';
import { MemoryTreeMirror } from '../repositories/memory-tree-mirror.js';
import { isReservedName } from '../storage/note-file-codec.js';
import type { FolderLocation, LoadedFolder, LoadedTree, TreeMirror, TreeRoot } from '../repositories/tree-mirror.js';
import {
  ROOT_FOLDER_ID,
  TRASH_FOLDER_ID,
  type ColorLabel,
  type Folder,
  type FolderChanges,
  type FolderContents,
  type FolderId,
  type FolderInfo,
  type FolderSummary,
  type Note,
  type NoteChanges,
  type NoteId,
  type NoteSummary,
  type NoteView,
  type PurgeStats,
  type SearchCriteria,
  type StoredCatalog,
  type StoredNote,
  type Tag,
  type TagId,
  type VersionSnapshot,
} from '../types/index.js';
import { decryptContent, encryptContent } from '../utils/encryption.js';
import logger from '../utils/logger.js';
import { createFolderRecord, createNoteRecord, detachId, overwriteContent, replaceContent } from './entities.js';
import { IdAllocator } from './id-allocator.js';
import { IdIndex } from './id-index.js';
import { err, ok, type Result } from './result.js';
import { searchNotes, type SearchSource } from './search.js';
import { ColorLabelRegistry, TagTable } from './tag-table.js';

export interface NoteTreeOptions {
  /**
   * Where the trees are mirrored. Defaults to an in-memory layout.
   */
  mirror?: TreeMirror;
  /**
   * Clock used for every timestamp.
   */
  now?: () => Date;
}

export interface LoadStats {
  notes: number;
  folders: number;
}

function validateFolderName(name: string): Result<string> {
  const trimmed = name.trim();
  if (!trimmed) {
    return err(new InvalidNameError(name, 'folder name must not be empty'));
  }
  if (trimmed === '.' || trimmed === '..') {
    return err(new InvalidNameError(name, 'reserved name'));
  }
  if (/[/\\]/.test(trimmed) || /[\u0000-\u001f]/.test(trimmed)) {
    return err(new InvalidNameError(name, 'folder name must not contain path separators or control characters'));
  }
  if (isReservedName(trimmed)) {
    return err(new InvalidNameError(name, 'name is reserved for note and metadata files'));
  }
  return ok(trimmed);
}

/**
 * The note session: owns the active and trash trees, the id index, the tag table and
 * the mirror. Every operation mutates the trees first, then the index, then the mirror.
 * A mirror failure is reported as IOError; the in-memory change is kept.
 */
export class NoteTree implements SearchSource {
  private readonly allocator = new IdAllocator();
  private readonly index = new IdIndex();
  private readonly tags: TagTable;
  private readonly labels = new ColorLabelRegistry();
  private readonly mirror: TreeMirror;
  private readonly now: () => Date;
  private readonly activeRoot: Folder;
  private readonly trashRoot: Folder;
  private currentFolderId: FolderId = ROOT_FOLDER_ID;
  private savedCatalogRevision = 0;

  constructor(options: NoteTreeOptions = {}) {
    this.mirror = options.mirror ?? new MemoryTreeMirror();
    this.now = options.now ?? (() => new Date());
    this.tags = new TagTable(this.allocator);

    const created = this.now();
    this.activeRoot = createFolderRecord(ROOT_FOLDER_ID, '', null, created);
    this.trashRoot = createFolderRecord(TRASH_FOLDER_ID, '', null, created);
    this.index.registerFolder(this.activeRoot);
    this.index.registerFolder(this.trashRoot);
  }

  // ---- Folders ----

  createFolder(parentId: FolderId, name: string): Result<FolderId> {
    const validated = validateFolderName(name);
    if (!validated.ok) return validated;
    const parent = this.activeFolder(parentId);
    if (!parent.ok) return parent;
    if (this.childFolderNamed(parent.value, validated.value)) {
      return err(new DuplicateNameError('Folder', validated.value));
    }

    const folder = createFolderRecord(this.allocator.nextId('folder'), validated.value, parent.value.id, this.now());
    parent.value.folderIds.push(folder.id);
    this.index.registerFolder(folder);
    logger.info({ folderId: folder.id, parentId, name: folder.name }, 'Folder created');

    const mirrored = this.mirrored('create folder', () => this.mirror.writeFolder(folder, this.locate(folder)));
    return mirrored.ok ? ok(folder.id) : mirrored;
  }

  moveFolder(folderId: FolderId, newParentId: FolderId): Result<void> {
    return this.updateFolder(folderId, { parentId: newParentId });
  }

  renameFolder(folderId: FolderId, newName: string): Result<void> {
    return this.updateFolder(folderId, { name: newName });
  }

  /**
   * Rename and/or move a folder. Every check runs before anything changes, so a
   * failed move never leaves a rename behind.
   */
  updateFolder(folderId: FolderId, changes: FolderChanges): Result<void> {
    const folder = this.movableFolder(folderId);
    if (!folder.ok) return folder;

    let name = folder.value.name;
    if (changes.name !== undefined) {
      const validated = validateFolderName(changes.name);
      if (!validated.ok) return validated;
      name = validated.value;
    }

    let parent = this.parentOf(folder.value);
    if (changes.parentId !== undefined) {
      const target = this.folderOf(changes.parentId);
      if (!target.ok) return target;
      if (this.isWithin(target.value, folder.value.id)) {
        return err(new CycleError(folderId, changes.parentId));
      }
      if (target.value.trashed || target.value.id === TRASH_FOLDER_ID) {
        return err(new InvalidOperationError(`Folder ${changes.parentId} is in the trash`));
      }
      parent = target.value;
    }
    if (!parent) {
      return err(new InvalidOperationError(`Folder ${folderId} has no parent`));
    }

    const sibling = this.childFolderNamed(parent, name);
    if (sibling && sibling.id !== folder.value.id) {
      return err(new DuplicateNameError('Folder', name));
    }
    if (name === folder.value.name && parent.id === folder.value.parentId) {
      return ok(undefined);
    }

    if (parent.id !== folder.value.parentId) {
      this.detachFolder(folder.value);
      parent.folderIds.push(folder.value.id);
      folder.value.parentId = parent.id;
    }
    folder.value.name = name;
    logger.info({ folderId, parentId: parent.id, name }, 'Folder updated');

    return this.mirrored('update folder', () => this.mirror.relocateFolder(folder.value, this.locate(folder.value)));
  }

  deleteFolder(folderId: FolderId, permanent = false): Result<void> {
    const folder = this.folderOf(folderId);
    if (!folder.ok) return folder;
    if (this.isRoot(folder.value)) {
      return err(new InvalidOperationError('Root folders cannot be deleted'));
    }

    if (permanent) {
      const purged = this.purgeFolder(folder.value);
      return purged.ok ? ok(undefined) : purged;
    }
    if (folder.value.trashed) {
      return err(new InvalidOperationError(`Folder ${folderId} is already in the trash`));
    }

    const parentId = folder.value.parentId;
    this.leaveIfInside(folder.value);
    this.detachFolder(folder.value);
    folder.value.originalParentId = parentId;
    folder.value.parentId = TRASH_FOLDER_ID;
    this.trashRoot.folderIds.push(folder.value.id);
    this.setTrashed(folder.value, true);
    logger.info({ folderId, originalParentId: parentId }, 'Folder moved to trash');

    return this.mirrored('trash folder', () => this.mirror.relocateFolder(folder.value, this.locate(folder.value)));
  }

  listContents(folderId: FolderId = this.currentFolderId): Result<FolderContents> {
    const folder = this.folderOf(folderId);
    if (!folder.ok) return folder;
    return ok(this.contentsOf(folder.value));
  }

  getFolder(folderId: FolderId): Result<FolderInfo> {
    const folder = this.folderOf(folderId);
    if (!folder.ok) return folder;
    const value = folder.value;
    return ok({
      ...this.folderSummary(value),
      parentId: value.parentId,
      path: this.folderPathOf(value),
      trashed: value.trashed,
      createdAt: value.createdAt,
      noteCount: value.noteIds.length,
      subfolderCount: value.folderIds.length,
      totalNoteCount: this.countNotes(value),
    });
  }

  getFolderPath(folderId: FolderId): Result<string> {
    const folder = this.folderOf(folderId);
    if (!folder.ok) return folder;
    return ok(this.folderPathOf(folder.value));
  }

  // ---- Navigation ----

  /**
   * Resolve a `/`-delimited folder path. Paths starting with `/` are absolute;
   * others are relative to the current folder. `.` and `..` are understood.
   */
  findFolderByPath(path: string): Result<FolderId> {
    let folder: Folder = path.startsWith('/') ? this.activeRoot : this.currentFolder();
    for (const segment of path.split('/')) {
      if (!segment || segment === '.') continue;
      if (segment === '..') {
        folder = this.parentOf(folder) ?? folder;
        continue;
      }
      const next = this.childFolderNamed(folder, segment);
      if (!next) {
        return err(new NotFoundError('Folder path', path));
      }
      folder = next;
    }
    return ok(folder.id);
  }

  changeCurrentFolder(path: string): Result<FolderId> {
    const resolved = this.findFolderByPath(path);
    if (!resolved.ok) return resolved;
    this.currentFolderId = resolved.value;
    logger.debug({ folderId: resolved.value, path }, 'Current folder changed');
    return resolved;
  }

  getCurrentFolderId(): FolderId {
    return this.currentFolderId;
  }

  getCurrentPath(): string {
    return this.folderPathOf(this.currentFolder());
  }

  // ---- Notes ----

  createNote(parentId: FolderId, title: string, content = '', tagNames: string[] = []): Result<NoteId> {
    const parent = this.activeFolder(parentId);
    if (!parent.ok) return parent;
    const tagIds = this.resolveTags(tagNames);
    if (!tagIds.ok) return tagIds;

    const note = createNoteRecord(this.allocator.nextId('note'), parent.value.id, title, content, this.now());
    note.tagIds = new Set(tagIds.value);
    parent.value.noteIds.push(note.id);
    this.index.registerNote(note);
    logger.info({ noteId: note.id, parentId, title }, 'Note created');

    const written = this.firstFailure([this.writeNoteFile(note, 'create note'), this.syncCatalog()]);
    return written.ok ? ok(note.id) : written;
  }

  getNote(noteId: NoteId): Result<NoteView> {
    const note = this.noteOf(noteId);
    if (!note.ok) return note;
    return ok(this.viewOf(note.value));
  }

  editNote(noteId: NoteId, changes: NoteChanges): Result<void> {
    const note = this.activeNote(noteId);
    if (!note.ok) return note;
    const tagIds = changes.tags ? this.resolveTags(changes.tags) : ok(undefined);
    if (!tagIds.ok) return tagIds;

    const now = this.now();
    if (changes.title !== undefined && changes.title !== note.value.title) {
      note.value.title = changes.title;
      note.value.modifiedAt = now;
    }
    if (changes.content !== undefined) {
      overwriteContent(note.value, changes.content, now);
    }
    if (tagIds.value) {
      note.value.tagIds = new Set(tagIds.value);
    }
    logger.info({ noteId, fields: Object.keys(changes) }, 'Note edited');

    return this.firstFailure([this.writeNoteFile(note.value, 'edit note'), this.syncCatalog()]);
  }

  renameNote(noteId: NoteId, newTitle: string): Result<void> {
    return this.editNote(noteId, { title: newTitle });
  }

  moveNote(noteId: NoteId, newFolderId: FolderId): Result<void> {
    const note = this.activeNote(noteId);
    if (!note.ok) return note;
    const target = this.activeFolder(newFolderId);
    if (!target.ok) return target;
    if (note.value.parentId === target.value.id) {
      return ok(undefined);
    }

    this.detachNote(note.value);
    target.value.noteIds.push(note.value.id);
    note.value.parentId = target.value.id;
    logger.info({ noteId, newFolderId }, 'Note moved');

    return this.writeNoteFile(note.value, 'move note');
  }

  deleteNote(noteId: NoteId, permanent = false): Result<void> {
    const note = this.noteOf(noteId);
    if (!note.ok) return note;

    if (permanent) {
      return this.purgeNote(note.value);
    }
    if (note.value.trashed) {
      return err(new InvalidOperationError(`Note ${noteId} is already in the trash`));
    }

    const parentId = note.value.parentId;
    this.detachNote(note.value);
    note.value.originalParentId = parentId;
    note.value.parentId = TRASH_FOLDER_ID;
    note.value.trashed = true;
    this.trashRoot.noteIds.push(noteId);
    logger.info({ noteId, originalParentId: parentId }, 'Note moved to trash');

    return this.writeNoteFile(note.value, 'trash note');
  }

  // ---- Versions ----

  getHistory(noteId: NoteId): Result<VersionSnapshot[]> {
    const note = this.noteOf(noteId);
    if (!note.ok) return note;
    return ok([...note.value.history]);
  }

  /**
   * Restore the content of a snapshot. The content being replaced is itself
   * pushed onto the history, the same as any other edit.
   */
  revertToVersion(noteId: NoteId, versionIndex: number): Result<void> {
    const note = this.activeNote(noteId);
    if (!note.ok) return note;
    const history = note.value.history;
    if (!Number.isInteger(versionIndex) || versionIndex < 0 || versionIndex >= history.length) {
      return err(new IndexOutOfRangeError(versionIndex, history.length));
    }

    const now = this.now();
    if (!overwriteContent(note.value, history[versionIndex].content, now)) {
      note.value.modifiedAt = now;
    }
    logger.info({ noteId, versionIndex }, 'Note reverted');

    return this.writeNoteFile(note.value, 'revert note');
  }

  // ---- Tags ----

  createTag(name: string): Result<TagId> {
    const tag = this.tags.create(name);
    if (!tag.ok) return tag;
    logger.info({ tagId: tag.value.id, name: tag.value.name }, 'Tag created');
    const saved = this.syncCatalog();
    return saved.ok ? ok(tag.value.id) : saved;
  }

  /**
   * Remove a tag from the table and from every note carrying it.
   */
  deleteTag(name: string): Result<void> {
    const removed = this.tags.remove(name);
    if (!removed.ok) return removed;

    const affected = this.index.allNotes().filter((note) => note.tagIds.delete(removed.value.id));
    logger.info({ tagId: removed.value.id, name: removed.value.name, notes: affected.length }, 'Tag deleted');
    return this.firstFailure([
      ...affected.map((note) => this.writeNoteFile(note, 'untag note')),
      this.syncCatalog(),
    ]);
  }

  addTagToNote(noteId: NoteId, tagName: string): Result<TagId> {
    const note = this.activeNote(noteId);
    if (!note.ok) return note;
    const tag = this.tags.resolve(tagName);
    if (!tag.ok) return tag;
    if (note.value.tagIds.has(tag.value.id)) {
      return ok(tag.value.id);
    }

    note.value.tagIds.add(tag.value.id);
    logger.info({ noteId, tag: tag.value.name }, 'Tag added to note');
    const written = this.firstFailure([this.writeNoteFile(note.value, 'tag note'), this.syncCatalog()]);
    return written.ok ? ok(tag.value.id) : written;
  }

  removeTagFromNote(noteId: NoteId, tagName: string): Result<void> {
    const note = this.activeNote(noteId);
    if (!note.ok) return note;
    const tag = this.tags.findByName(tagName.trim());
    if (!tag || !note.value.tagIds.delete(tag.id)) {
      return err(new NotFoundError(`Tag on note ${noteId}`, tagName));
    }

    logger.info({ noteId, tag: tag.name }, 'Tag removed from note');
    return this.writeNoteFile(note.value, 'untag note');
  }

  /**
   * Every tag in the table, referenced or not.
   */
  listTags(): Tag[] {
    return this.tags.list();
  }

  /**
   * Tags carried by at least one note in the active tree.
   */
  getAllTags(): Tag[] {
    const referenced = new Set<TagId>();
    for (const note of this.notesInOrder('active')) {
      note.tagIds.forEach((id) => referenced.add(id));
    }
    return this.tags.list().filter((tag) => referenced.has(tag.id));
  }

  // ---- Search ----

  search(criteria: SearchCriteria): NoteSummary[] {
    return searchNotes(this, criteria).map((note) => this.noteSummary(note));
  }

  searchNotesByKeyword(keyword: string): NoteSummary[] {
    return this.search({ keyword });
  }

  searchNotesByTag(tagName: string): NoteSummary[] {
    return this.search({ tags: [tagName] });
  }

  notesInOrder(root: TreeRoot): Note[] {
    const notes: Note[] = [];
    const visit = (folder: Folder): void => {
      for (const noteId of folder.noteIds) {
        const note = this.index.getNote(noteId);
        if (note) notes.push(note);
      }
      for (const childId of folder.folderIds) {
        const child = this.index.getFolder(childId);
        if (child) visit(child);
      }
    };
    visit(root === 'active' ? this.activeRoot : this.trashRoot);
    return notes;
  }

  tagNamesOf(note: Note): string[] {
    return this.tags.namesOf(note.tagIds);
  }

  // ---- Trash ----

  getTrashContents(): FolderContents {
    return this.contentsOf(this.trashRoot);
  }

  /**
   * Move a top-level trash entry back under the folder it was deleted from.
   * On any failure the item stays in the trash.
   */
  restoreItem(id: number, isNote: boolean): Result<void> {
    const entry = isNote ? this.index.getNote(id) : this.index.getFolder(id);
    if (!entry || entry.parentId !== TRASH_FOLDER_ID) {
      return err(new NotFoundError(isNote ? 'Trashed note' : 'Trashed folder', id));
    }

    const targetId = entry.originalParentId;
    const target = targetId === null ? undefined : this.index.getFolder(targetId);
    if (!target || target.trashed || target.id === TRASH_FOLDER_ID) {
      return err(new OriginalParentGoneError(targetId));
    }

    if (isNote) {
      const note = this.index.getNote(id);
      if (!note) return err(new NotFoundError('Trashed note', id));
      detachId(this.trashRoot.noteIds, id);
      target.noteIds.push(id);
      note.parentId = target.id;
      note.trashed = false;
      note.originalParentId = null;
      logger.info({ noteId: id, folderId: target.id }, 'Note restored');
      return this.writeNoteFile(note, 'restore note');
    }

    const folder = this.index.getFolder(id);
    if (!folder) return err(new NotFoundError('Trashed folder', id));
    if (this.childFolderNamed(target, folder.name)) {
      return err(new DuplicateNameError('Folder', folder.name));
    }
    detachId(this.trashRoot.folderIds, id);
    target.folderIds.push(id);
    folder.parentId = target.id;
    folder.originalParentId = null;
    this.setTrashed(folder, false);
    logger.info({ folderId: id, parentId: target.id }, 'Folder restored');
    return this.mirrored('restore folder', () => this.mirror.relocateFolder(folder, this.locate(folder)));
  }

  /**
   * Purge everything under the trash root, deepest items first.
   */
  emptyTrash(): Result<PurgeStats> {
    const stats: PurgeStats = { notes: 0, folders: 0 };
    const outcomes: Result<unknown>[] = [];

    for (const folderId of [...this.trashRoot.folderIds]) {
      const folder = this.index.getFolder(folderId);
      if (!folder) continue;
      const purged = this.purgeFolder(folder);
      outcomes.push(purged);
      if (purged.ok) {
        stats.notes += purged.value.notes;
        stats.folders += purged.value.folders;
      }
    }
    for (const noteId of [...this.trashRoot.noteIds]) {
      const note = this.index.getNote(noteId);
      if (!note) continue;
      outcomes.push(this.purgeNote(note));
      stats.notes += 1;
    }

    logger.info(stats, 'Trash emptied');
    const failure = this.firstFailure(outcomes);
    return failure.ok ? ok(stats) : failure;
  }

  // ---- Attachments, reminders, labels ----

  addAttachment(noteId: NoteId, filePath: string): Result<void> {
    const note = this.activeNote(noteId);
    if (!note.ok) return note;
    if (note.value.attachments.includes(filePath)) {
      return ok(undefined);
    }
    note.value.attachments.push(filePath);
    return this.writeNoteFile(note.value, 'attach file');
  }

  removeAttachment(noteId: NoteId, filePath: string): Result<void> {
    const note = this.activeNote(noteId);
    if (!note.ok) return note;
    const position = note.value.attachments.indexOf(filePath);
    if (position === -1) {
      return err(new NotFoundError(`Attachment on note ${noteId}`, filePath));
    }
    note.value.attachments.splice(position, 1);
    return this.writeNoteFile(note.value, 'detach file');
  }

  addReminder(noteId: NoteId, dueAt: Date, description: string): Result<number> {
    const note = this.activeNote(noteId);
    if (!note.ok) return note;
    note.value.reminders.push({ dueAt, description, completed: false });
    const written = this.writeNoteFile(note.value, 'add reminder');
    return written.ok ? ok(note.value.reminders.length - 1) : written;
  }

  completeReminder(noteId: NoteId, reminderIndex: number): Result<void> {
    const note = this.activeNote(noteId);
    if (!note.ok) return note;
    const reminder = note.value.reminders[reminderIndex];
    if (!Number.isInteger(reminderIndex) || !reminder) {
      return err(new IndexOutOfRangeError(reminderIndex, note.value.reminders.length));
    }
    reminder.completed = true;
    return this.writeNoteFile(note.value, 'complete reminder');
  }

  defineColorLabel(name: string, color: string): Result<ColorLabel> {
    const label = this.labels.define(name, color);
    if (!label.ok) return label;
    logger.info(label.value, 'Color label defined');
    const saved = this.syncCatalog();
    return saved.ok ? label : saved;
  }

  listColorLabels(): ColorLabel[] {
    return this.labels.list();
  }

  setColorLabel(noteId: NoteId, labelName: string | null): Result<void> {
    const note = this.activeNote(noteId);
    if (!note.ok) return note;
    if (labelName !== null && !this.labels.get(labelName)) {
      return err(new NotFoundError('Color label', labelName));
    }
    note.value.colorLabel = labelName;
    return this.writeNoteFile(note.value, 'label note');
  }

  // ---- Encryption ----

  encryptNote(noteId: NoteId, passphrase: string): Result<void> {
    const note = this.activeNote(noteId);
    if (!note.ok) return note;
    if (note.value.encrypted) {
      return err(new InvalidOperationError(`Note ${noteId} is already encrypted`));
    }
    replaceContent(note.value, encryptContent(note.value.content, passphrase));
    note.value.encrypted = true;
    logger.info({ noteId }, 'Note encrypted');
    return this.writeNoteFile(note.value, 'encrypt note');
  }

  decryptNote(noteId: NoteId, passphrase: string): Result<void> {
    const note = this.activeNote(noteId);
    if (!note.ok) return note;
    if (!note.value.encrypted) {
      return err(new InvalidOperationError(`Note ${noteId} is not encrypted`));
    }
    const plaintext = decryptContent(note.value.content, passphrase);
    if (plaintext === null) {
      return err(new DecryptionError(noteId));
    }
    replaceContent(note.value, plaintext);
    note.value.encrypted = false;
    logger.info({ noteId }, 'Note decrypted');
    return this.writeNoteFile(note.value, 'decrypt note');
  }

  // ---- Import / export ----

  importNoteFromText(filePath: string, folderId: FolderId = this.currentFolderId): Result<NoteId> {
    let content: string;
    try {
      content = readFileSync(filePath, 'utf-8');
    } catch (error) {
      return err(new IOError('read', filePath, errorMessage(error)));
    }
    return this.createNote(folderId, basename(filePath, extname(filePath)), content);
  }

  convertNoteToHtml(noteId: NoteId): Result<string> {
    const note = this.getNote(noteId);
    return note.ok ? ok(renderHtml(note.value)) : note;
  }

  exportNoteToMarkdown(noteId: NoteId, filePath: string): Result<void> {
    return this.exportNote(noteId, filePath, renderMarkdown);
  }

  exportNoteToJson(noteId: NoteId, filePath: string): Result<void> {
    return this.exportNote(noteId, filePath, renderJson);
  }

  // ---- Loading ----

  /**
   * Rebuild both trees from the mirror. Only valid on a fresh tree.
   */
  load(): Result<LoadStats> {
    if (this.index.noteCount > 0 || this.index.folderCount > 2) {
      return err(new InvalidOperationError('Tree is not empty'));
    }

    let snapshot: LoadedTree;
    try {
      snapshot = this.mirror.load();
    } catch (error) {
      if (error instanceof IOError) return err(error);
      throw error;
    }

    this.observeIds(snapshot.active);
    this.observeIds(snapshot.trash);
    this.restoreCatalog(snapshot.catalog);

    const repairs: Array<() => void> = [];
    this.buildFolder(snapshot.active, this.activeRoot, repairs);
    this.buildFolder(snapshot.trash, this.trashRoot, repairs);

    for (const repair of repairs) {
      const outcome = this.mirrored('repair mirror', repair);
      if (!outcome.ok) {
        logger.warn({ error: outcome.error.message }, 'Could not rewrite loaded entry');
      }
    }
    const catalog = this.syncCatalog();
    if (!catalog.ok) {
      logger.warn({ error: catalog.error.message }, 'Could not rewrite catalog');
    }

    const stats = { notes: this.index.noteCount, folders: this.index.folderCount - 2 };
    logger.info(stats, 'Loaded note tree');
    return ok(stats);
  }

  // ---- Internals ----

  private restoreCatalog(catalog: StoredCatalog | null): void {
    for (const tag of catalog?.tags ?? []) {
      const restored = this.tags.restore(tag);
      if (!restored.ok) logger.warn({ tag, error: restored.error.message }, 'Ignoring catalog tag');
    }
    for (const label of catalog?.labels ?? []) {
      const defined = this.labels.define(label.name, label.color);
      if (!defined.ok) logger.warn({ label, error: defined.error.message }, 'Ignoring catalog label');
    }
    this.savedCatalogRevision = this.catalogRevision();
  }

  private catalogRevision(): number {
    return this.tags.revision + this.labels.revision;
  }

  /**
   * Write the catalog when tags or labels changed since it was last written.
   */
  private syncCatalog(): Result<void> {
    const revision = this.catalogRevision();
    if (revision === this.savedCatalogRevision) {
      return ok(undefined);
    }
    const written = this.mirrored('write catalog', () =>
      this.mirror.writeCatalog({ tags: this.tags.list(), labels: this.labels.list() })
    );
    if (written.ok) this.savedCatalogRevision = revision;
    return written;
  }

  private observeIds(loaded: LoadedFolder): void {
    if (loaded.metadata) this.allocator.observe('folder', loaded.metadata.id);
    loaded.notes.forEach(({ note }) => this.allocator.observe('note', note.id));
    loaded.folders.forEach((child) => this.observeIds(child));
  }

  private buildFolder(loaded: LoadedFolder, folder: Folder, repairs: Array<() => void>): void {
    const inTrash = folder.id === TRASH_FOLDER_ID || folder.trashed;
    const atTrashTop = folder.id === TRASH_FOLDER_ID;

    for (const { path, note: stored } of loaded.notes) {
      const taken = this.index.hasNote(stored.id);
      if (taken) {
        logger.warn({ noteId: stored.id, path: path.segments.join('/') }, 'Duplicate note id on disk; assigning a new id');
      }
      const note = createNoteRecord(
        taken ? this.allocator.nextId('note') : stored.id,
        folder.id,
        stored.title,
        stored.content,
        stored.createdAt
      );
      note.modifiedAt = stored.modifiedAt;
      note.history = stored.history;
      note.attachments = stored.attachments;
      note.reminders = stored.reminders;
      note.encrypted = stored.encrypted;
      note.trashed = inTrash;
      note.originalParentId = atTrashTop ? stored.originalParentId : null;
      for (const name of stored.tags) {
        const tag = this.tags.resolve(name);
        if (tag.ok) note.tagIds.add(tag.value.id);
        else logger.warn({ noteId: note.id, tag: name }, 'Ignoring invalid tag name');
      }
      // The catalog's color wins over the copy kept in the note header.
      if (stored.colorLabel) {
        const { name, color } = stored.colorLabel;
        if (this.labels.get(name) || this.labels.define(name, color).ok) {
          note.colorLabel = name;
        }
      }

      folder.noteIds.push(note.id);
      this.index.registerNote(note);
      this.mirror.adoptNote(note.id, path);
      if (taken) {
        repairs.push(() => this.mirror.writeNote(this.storedNote(note), this.locate(note)));
      }
    }

    for (const child of loaded.folders) {
      const metadata = child.metadata;
      const taken = metadata !== null && this.index.hasFolder(metadata.id);
      if (taken) {
        logger.warn({ folderId: metadata.id, path: child.path.segments.join('/') }, 'Duplicate folder id on disk; assigning a new id');
      }
      const id = metadata && !taken ? metadata.id : this.allocator.nextId('folder');
      const created = createFolderRecord(id, child.name, folder.id, metadata?.createdAt ?? this.now());
      created.trashed = inTrash;
      created.originalParentId = atTrashTop ? metadata?.originalParentId ?? null : null;

      folder.folderIds.push(created.id);
      this.index.registerFolder(created);
      this.mirror.adoptFolder(created.id, child.path);
      if (!metadata || taken || metadata.name !== created.name) {
        repairs.push(() => this.mirror.relocateFolder(created, this.locate(created)));
      }
      this.buildFolder(child, created, repairs);
    }
  }

  private exportNote(noteId: NoteId, filePath: string, render: (note: NoteView) => string): Result<void> {
    const note = this.getNote(noteId);
    if (!note.ok) return note;
    try {
      writeFileSync(filePath, render(note.value), 'utf-8');
    } catch (error) {
      return err(new IOError('write', filePath, errorMessage(error)));
    }
    logger.info({ noteId, filePath }, 'Note exported');
    return ok(undefined);
  }

  private purgeNote(note: Note): Result<void> {
    this.detachNote(note);
    this.index.unregisterNote(note.id);
    logger.info({ noteId: note.id }, 'Note purged');
    return this.mirrored('remove note', () => this.mirror.removeNote(note.id));
  }

  private purgeFolder(folder: Folder): Result<PurgeStats> {
    this.leaveIfInside(folder);
    this.detachFolder(folder);
    const stats = this.unregisterSubtree(folder);
    logger.info({ folderId: folder.id, ...stats }, 'Folder purged');
    const mirrored = this.mirrored('remove folder', () => this.mirror.removeFolder(folder.id));
    return mirrored.ok ? ok(stats) : mirrored;
  }

  private unregisterSubtree(folder: Folder): PurgeStats {
    const stats: PurgeStats = { notes: 0, folders: 0 };
    for (const childId of folder.folderIds) {
      const child = this.index.getFolder(childId);
      if (!child) continue;
      const nested = this.unregisterSubtree(child);
      stats.notes += nested.notes;
      stats.folders += nested.folders;
    }
    for (const noteId of folder.noteIds) {
      this.index.unregisterNote(noteId);
      stats.notes += 1;
    }
    this.index.unregisterFolder(folder.id);
    stats.folders += 1;
    return stats;
  }

  private setTrashed(folder: Folder, trashed: boolean): void {
    folder.trashed = trashed;
    for (const noteId of folder.noteIds) {
      const note = this.index.getNote(noteId);
      if (note) note.trashed = trashed;
    }
    for (const childId of folder.folderIds) {
      const child = this.index.getFolder(childId);
      if (child) this.setTrashed(child, trashed);
    }
  }

  /**
   * Reset the current folder to the root when it is about to leave the active tree.
   */
  private leaveIfInside(folder: Folder): void {
    if (this.isWithin(this.currentFolder(), folder.id)) {
      this.currentFolderId = ROOT_FOLDER_ID;
    }
  }

  /**
   * Whether `folder` is `ancestorId` or sits below it, walking the parent chain upward.
   */
  private isWithin(folder: Folder, ancestorId: FolderId): boolean {
    let cursor: Folder | undefined = folder;
    while (cursor) {
      if (cursor.id === ancestorId) return true;
      cursor = this.parentOf(cursor);
    }
    return false;
  }

  private detachFolder(folder: Folder): void {
    const parent = this.parentOf(folder);
    if (parent) detachId(parent.folderIds, folder.id);
  }

  private detachNote(note: Note): void {
    const parent = this.index.getFolder(note.parentId);
    if (parent) detachId(parent.noteIds, note.id);
  }

  private parentOf(folder: Folder): Folder | undefined {
    return folder.parentId === null ? undefined : this.index.getFolder(folder.parentId);
  }

  private childFolderNamed(parent: Folder, name: string): Folder | undefined {
    for (const childId of parent.folderIds) {
      const child = this.index.getFolder(childId);
      if (child?.name === name) return child;
    }
    return undefined;
  }

  private currentFolder(): Folder {
    return this.index.getFolder(this.currentFolderId) ?? this.activeRoot;
  }

  private isRoot(folder: Folder): boolean {
    return folder.id === ROOT_FOLDER_ID || folder.id === TRASH_FOLDER_ID;
  }

  private folderOf(folderId: FolderId): Result<Folder> {
    const folder = this.index.getFolder(folderId);
    return folder ? ok(folder) : err(new NotFoundError('Folder', folderId));
  }

  private noteOf(noteId: NoteId): Result<Note> {
    const note = this.index.getNote(noteId);
    return note ? ok(note) : err(new NotFoundError('Note', noteId));
  }

  private activeFolder(folderId: FolderId): Result<Folder> {
    const folder = this.folderOf(folderId);
    if (!folder.ok) return folder;
    if (folder.value.trashed || folder.value.id === TRASH_FOLDER_ID) {
      return err(new InvalidOperationError(`Folder ${folderId} is in the trash`));
    }
    return folder;
  }

  private movableFolder(folderId: FolderId): Result<Folder> {
    const folder = this.activeFolder(folderId);
    if (!folder.ok) return folder;
    if (this.isRoot(folder.value)) {
      return err(new InvalidOperationError('Root folders cannot be moved or renamed'));
    }
    return folder;
  }

  private activeNote(noteId: NoteId): Result<Note> {
    const note = this.noteOf(noteId);
    if (!note.ok) return note;
    if (note.value.trashed) {
      return err(new InvalidOperationError(`Note ${noteId} is in the trash`));
    }
    return note;
  }

  private resolveTags(names: string[]): Result<TagId[]> {
    const ids: TagId[] = [];
    for (const name of names) {
      const tag = this.tags.resolve(name);
      if (!tag.ok) return tag;
      ids.push(tag.value.id);
    }
    return ok(ids);
  }

  private locate(entity: Folder | Note): FolderLocation {
    let cursor = 'noteIds' in entity ? entity : this.index.getFolder(entity.parentId);
    const chain: Folder[] = [];
    while (cursor && !this.isRoot(cursor)) {
      chain.unshift(cursor);
      cursor = this.parentOf(cursor);
    }
    return { root: cursor?.id === TRASH_FOLDER_ID ? 'trash' : 'active', chain };
  }

  private folderPathOf(folder: Folder): string {
    const location = this.locate(folder);
    const path = `/${location.chain.map((entry) => entry.name).join('/')}`;
    return location.root === 'trash' ? `trash:${path}` : path;
  }

  private countNotes(folder: Folder): number {
    return folder.folderIds.reduce((total, childId) => {
      const child = this.index.getFolder(childId);
      return child ? total + this.countNotes(child) : total;
    }, folder.noteIds.length);
  }

  private contentsOf(folder: Folder): FolderContents {
    const notes = folder.noteIds
      .map((id) => this.index.getNote(id))
      .filter((note): note is Note => note !== undefined)
      .map((note) => this.noteSummary(note));
    const folders = folder.folderIds
      .map((id) => this.index.getFolder(id))
      .filter((child): child is Folder => child !== undefined)
      .map((child) => this.folderSummary(child));
    return { notes, folders };
  }

  private noteSummary(note: Note): NoteSummary {
    return {
      id: note.id,
      title: note.title,
      modifiedAt: note.modifiedAt,
      tags: this.tagNamesOf(note),
      originalParentId: note.originalParentId,
    };
  }

  private folderSummary(folder: Folder): FolderSummary {
    return { id: folder.id, name: folder.name, originalParentId: folder.originalParentId };
  }

  private viewOf(note: Note): NoteView {
    return {
      id: note.id,
      title: note.title,
      content: note.content,
      createdAt: note.createdAt,
      modifiedAt: note.modifiedAt,
      tags: this.tagNamesOf(note),
      attachments: [...note.attachments],
      reminders: note.reminders.map((reminder) => ({ ...reminder })),
      colorLabel: note.colorLabel ? this.labels.get(note.colorLabel) ?? null : null,
      trashed: note.trashed,
      originalParentId: note.originalParentId,
      encrypted: note.encrypted,
      wordCount: note.wordCount,
      charCount: note.charCount,
      versionCount: note.history.length,
      folderId: note.parentId,
    };
  }

  private storedNote(note: Note): StoredNote {
    return {
      id: note.id,
      title: note.title,
      content: note.content,
      tags: this.tagNamesOf(note),
      createdAt: note.createdAt,
      modifiedAt: note.modifiedAt,
      encrypted: note.encrypted,
      originalParentId: note.originalParentId,
      colorLabel: note.colorLabel ? this.labels.get(note.colorLabel) ?? null : null,
      attachments: note.attachments,
      reminders: note.reminders,
      history: note.history,
    };
  }

  private writeNoteFile(note: Note, operation: string): Result<void> {
    return this.mirrored(operation, () => this.mirror.writeNote(this.storedNote(note), this.locate(note)));
  }

  private mirrored(operation: string, action: () => void): Result<void> {
    try {
      action();
      return ok(undefined);
    } catch (error) {
      if (!(error instanceof IOError)) throw error;
      logger.error({ error: error.message, operation }, 'Mirror write failed; memory and disk may disagree');
      return err(error);
    }
  }

  private firstFailure(outcomes: Result<unknown>[]): Result<void> {
    for (const outcome of outcomes) {
      if (!outcome.ok) return outcome;
    }
    return ok(undefined);
  }
}

/**
 * Open a note tree mirrored on disk, rebuilding it from whatever is already there.
 */
export function initializeFromFileSystem(
  basePath = 'data',
  trashPath = 'trash',
  options: Omit<NoteTreeOptions, 'mirror'> = {}
): Result<NoteTree> {
  const tree = new NoteTree({ ...options, mirror: new DiskTreeMirror(basePath, trashPath) });
  const loaded = tree.load();
  return loaded.ok ? ok(tree) : loaded;
}
