import type { Folder, FolderId, Note, NoteId } from '../types/index.js';

/**
 * Flat id -> entity lookup, kept in lockstep with the folder trees.
 * Roots are registered like any other folder.
 */
export class IdIndex {
  private notes = new Map<NoteId, Note>();
  private folders = new Map<FolderId, Folder>();

  registerNote(note: Note): void {
    this.notes.set(note.id, note);
  }

  registerFolder(folder: Folder): void {
    this.folders.set(folder.id, folder);
  }

  unregisterNote(id: NoteId): void {
    this.notes.delete(id);
  }

  unregisterFolder(id: FolderId): void {
    this.folders.delete(id);
  }

  getNote(id: NoteId): Note | undefined {
    return this.notes.get(id);
  }

  getFolder(id: FolderId): Folder | undefined {
    return this.folders.get(id);
  }

  hasNote(id: NoteId): boolean {
    return this.notes.has(id);
  }

  hasFolder(id: FolderId): boolean {
    return this.folders.has(id);
  }

  allNotes(): Note[] {
    return Array.from(this.notes.values());
  }

  get noteCount(): number {
    return this.notes.size;
  }

  get folderCount(): number {
    return this.folders.size;
  }
}
