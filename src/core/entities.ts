import type { Folder, FolderId, Note, NoteId } from '../types/index.js';

export function countWords(content: string): number {
  const trimmed = content.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function countChars(content: string): number {
  return Array.from(content).length;
}

export function createNoteRecord(
  id: NoteId,
  parentId: FolderId,
  title: string,
  content: string,
  now: Date
): Note {
  return {
    id,
    title,
    content,
    createdAt: now,
    modifiedAt: now,
    tagIds: new Set(),
    history: [],
    attachments: [],
    reminders: [],
    colorLabel: null,
    trashed: false,
    originalParentId: null,
    encrypted: false,
    wordCount: countWords(content),
    charCount: countChars(content),
    parentId,
  };
}

export function createFolderRecord(
  id: FolderId,
  name: string,
  parentId: FolderId | null,
  now: Date
): Folder {
  return {
    id,
    name,
    parentId,
    noteIds: [],
    folderIds: [],
    trashed: false,
    originalParentId: null,
    createdAt: now,
  };
}

/**
 * Replace the content without touching history; keeps the derived counts current.
 */
export function replaceContent(note: Note, content: string): void {
  note.content = content;
  note.wordCount = countWords(content);
  note.charCount = countChars(content);
}

/**
 * Overwrite the content of a note, snapshotting the previous content first.
 * Returns false when the content is unchanged and nothing was written.
 */
export function overwriteContent(note: Note, content: string, now: Date): boolean {
  if (note.content === content) {
    return false;
  }
  note.history.push({ timestamp: now, content: note.content });
  replaceContent(note, content);
  note.modifiedAt = now;
  return true;
}

export function detachId(ids: number[], id: number): boolean {
  const index = ids.indexOf(id);
  if (index === -1) return false;
  ids.splice(index, 1);
  return true;
}
