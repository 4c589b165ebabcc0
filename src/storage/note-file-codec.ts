import { z } from 'zod';

import { ParseError, errorMessage } from '../errors.js';
import type { StoredCatalog, StoredFolder, StoredNote } from '../types/index.js';

/**
 * Note file format:
 *
 *   ---
 *   id: 3
 *   title: "Plan"
 *   tags: ["urgent"]
 *   ...
 *   ---
 *
 *   <content, verbatim>
 *
 * Every header value is JSON so titles and history entries survive line breaks.
 */

const DELIMITER = '---';
const NOTE_EXTENSION = '.md';
export const FOLDER_METADATA_FILE = '.folder.json';
export const CATALOG_FILE = '.catalog.json';

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const noteHeaderSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  tags: z.array(z.string()).default([]),
  createdAt: isoDate,
  modifiedAt: isoDate,
  encrypted: z.boolean().default(false),
  originalParentId: z.number().int().nullable().default(null),
  colorLabel: z.object({ name: z.string(), color: z.string() }).nullable().default(null),
  attachments: z.array(z.string()).default([]),
  reminders: z
    .array(z.object({ dueAt: isoDate, description: z.string(), completed: z.boolean() }))
    .default([]),
  history: z.array(z.object({ timestamp: isoDate, content: z.string() })).default([]),
});

const folderMetadataSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  createdAt: isoDate,
  originalParentId: z.number().int().nullable().default(null),
});

const catalogSchema = z.object({
  tags: z.array(z.object({ id: z.number().int().positive(), name: z.string().min(1) })).default([]),
  labels: z.array(z.object({ name: z.string().min(1), color: z.string() })).default([]),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

function parseJson(text: string, filePath: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ParseError(filePath, errorMessage(error));
  }
}

export function serializeNote(note: StoredNote): string {
  const header: Record<string, unknown> = {
    id: note.id,
    title: note.title,
    tags: note.tags,
    createdAt: note.createdAt.toISOString(),
    modifiedAt: note.modifiedAt.toISOString(),
    encrypted: note.encrypted,
    originalParentId: note.originalParentId,
    colorLabel: note.colorLabel,
    attachments: note.attachments,
    reminders: note.reminders.map((reminder) => ({
      dueAt: reminder.dueAt.toISOString(),
      description: reminder.description,
      completed: reminder.completed,
    })),
    history: note.history.map((version) => ({
      timestamp: version.timestamp.toISOString(),
      content: version.content,
    })),
  };

  const lines = Object.entries(header).map(([key, value]) => `${key}: ${JSON.stringify(value)}`);
  return [DELIMITER, ...lines, DELIMITER, '', note.content].join('\n');
}

/**
 * Parse a note file. Throws ParseError for anything that does not follow the format.
 */
export function parseNote(text: string, filePath: string): StoredNote {
  if (!text.startsWith(`${DELIMITER}\n`)) {
    throw new ParseError(filePath, 'missing header delimiter');
  }

  const headerEnd = text.indexOf(`\n${DELIMITER}\n`, DELIMITER.length);
  if (headerEnd === -1) {
    throw new ParseError(filePath, 'unterminated header');
  }

  const raw: Record<string, unknown> = {};
  const headerLines = text.slice(DELIMITER.length + 1, headerEnd).split('\n');
  for (const line of headerLines) {
    if (!line.trim()) continue;
    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) {
      throw new ParseError(filePath, `malformed header line '${line}'`);
    }
    const key = line.slice(0, colonIndex).trim();
    try {
      raw[key] = JSON.parse(line.slice(colonIndex + 1));
    } catch (error) {
      throw new ParseError(filePath, `header '${key}': ${errorMessage(error)}`);
    }
  }

  const parsed = noteHeaderSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseError(filePath, describeIssues(parsed.error));
  }

  // Body starts after the closing delimiter and the single blank separator line.
  let body = text.slice(headerEnd + DELIMITER.length + 2);
  if (body.startsWith('\n')) {
    body = body.slice(1);
  }

  return { ...parsed.data, content: body };
}

export function serializeFolderMetadata(folder: StoredFolder): string {
  return JSON.stringify(
    {
      id: folder.id,
      name: folder.name,
      createdAt: folder.createdAt.toISOString(),
      originalParentId: folder.originalParentId,
    },
    null,
    2
  );
}

export function parseFolderMetadata(text: string, filePath: string): StoredFolder {
  const parsed = folderMetadataSchema.safeParse(parseJson(text, filePath));
  if (!parsed.success) {
    throw new ParseError(filePath, describeIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * The tag table and color labels, kept at the top of the data root.
 */
export function serializeCatalog(catalog: StoredCatalog): string {
  return JSON.stringify({ tags: catalog.tags, labels: catalog.labels }, null, 2);
}

export function parseCatalog(text: string, filePath: string): StoredCatalog {
  const parsed = catalogSchema.safeParse(parseJson(text, filePath));
  if (!parsed.success) {
    throw new ParseError(filePath, describeIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Lowercase, hyphenated form of a title for use in file names.
 */
export function slugify(title: string): string {
  return title
    .normalize('NFKD')
    .replace(/[^\w\s-]/g, '')
    .trim()
    .toLowerCase()
    .replace(/[\s_]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 60);
}

export function noteFileName(id: number, title: string): string {
  const slug = slugify(title);
  return slug ? `${id}-${slug}${NOTE_EXTENSION}` : `${id}${NOTE_EXTENSION}`;
}

export function isNoteFile(fileName: string): boolean {
  return fileName.endsWith(NOTE_EXTENSION) && !fileName.startsWith('.');
}

/**
 * Names the mirror uses for its own files; a folder directory may not take them.
 */
export function isReservedName(name: string): boolean {
  return name === FOLDER_METADATA_FILE || name === CATALOG_FILE || isNoteFile(name);
}
