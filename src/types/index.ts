/**
 * Core type definitions for notetree
 */

export interface AppConfig {
  dataPath: string;
  trashPath: string;
  settingsPath: string;
  server: {
    port: number;
    host: string;
  };
  logLevel: string;
}

// ---- Identifiers ----

export type NoteId = number;
export type FolderId = number;
export type TagId = number;

export type EntityKind = 'note' | 'folder' | 'tag';

export const ROOT_FOLDER_ID: FolderId = 0;
export const TRASH_FOLDER_ID: FolderId = -1;

// ---- Entities ----

/**
 * Immutable copy of a note's content, captured right before it was overwritten.
 */
export interface VersionSnapshot {
  readonly timestamp: Date;
  readonly content: string;
}

export interface Reminder {
  dueAt: Date;
  description: string;
  completed: boolean;
}

export interface ColorLabel {
  name: string;
  color: string; // e.g. "#FF0000"
}

export interface Tag {
  id: TagId;
  name: string;
}

/**
 * A note record. The parent is an id reference resolved through the index;
 * the owning folder lists this note in its `noteIds`.
 */
export interface Note {
  readonly id: NoteId;
  title: string;
  content: string;
  readonly createdAt: Date;
  modifiedAt: Date;
  tagIds: Set<TagId>;
  history: VersionSnapshot[];
  attachments: string[];
  reminders: Reminder[];
  colorLabel: string | null;
  trashed: boolean;
  originalParentId: FolderId | null;
  encrypted: boolean;
  wordCount: number;
  charCount: number;
  parentId: FolderId;
}

export interface Folder {
  readonly id: FolderId;
  name: string;
  parentId: FolderId | null;
  noteIds: NoteId[];
  folderIds: FolderId[];
  trashed: boolean;
  originalParentId: FolderId | null;
  readonly createdAt: Date;
}

// ---- Views handed to callers ----

export interface NoteView {
  id: NoteId;
  title: string;
  content: string;
  createdAt: Date;
  modifiedAt: Date;
  tags: string[];
  attachments: string[];
  reminders: Reminder[];
  colorLabel: ColorLabel | null;
  trashed: boolean;
  originalParentId: FolderId | null;
  encrypted: boolean;
  wordCount: number;
  charCount: number;
  versionCount: number;
  folderId: FolderId;
}

export interface NoteSummary {
  id: NoteId;
  title: string;
  modifiedAt: Date;
  tags: string[];
  originalParentId: FolderId | null;
}

export interface FolderSummary {
  id: FolderId;
  name: string;
  originalParentId: FolderId | null;
}

export interface FolderInfo extends FolderSummary {
  parentId: FolderId | null;
  path: string;
  trashed: boolean;
  createdAt: Date;
  noteCount: number;
  subfolderCount: number;
  totalNoteCount: number;
}

export interface FolderContents {
  notes: NoteSummary[];
  folders: FolderSummary[];
}

export interface NoteChanges {
  title?: string;
  content?: string;
  tags?: string[];
}

export interface FolderChanges {
  name?: string;
  parentId?: FolderId;
}

export type SearchScope = 'active' | 'trash' | 'all';

export interface SearchCriteria {
  keyword?: string;
  tags?: string[];
  modifiedFrom?: Date;
  modifiedTo?: Date;
  scope?: SearchScope;
}

export interface PurgeStats {
  notes: number;
  folders: number;
}

// ---- Persisted shapes ----

/**
 * Serialized form of a note as it is written to a note file.
 */
export interface StoredNote {
  id: NoteId;
  title: string;
  content: string;
  tags: string[];
  createdAt: Date;
  modifiedAt: Date;
  encrypted: boolean;
  originalParentId: FolderId | null;
  colorLabel: ColorLabel | null;
  attachments: string[];
  reminders: Reminder[];
  history: VersionSnapshot[];
}

/**
 * Contents of a folder's `.folder.json` metadata file.
 */
export interface StoredFolder {
  id: FolderId;
  name: string;
  createdAt: Date;
  originalParentId: FolderId | null;
}

/**
 * Contents of the catalog file: every tag, referenced or not, and every color label.
 */
export interface StoredCatalog {
  tags: Tag[];
  labels: ColorLabel[];
}
