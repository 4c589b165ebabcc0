import { cpSync, existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { initializeFromFileSystem, type NoteTree } from '../core/note-tree.js';
import type { Result } from '../core/result.js';
import { ROOT_FOLDER_ID } from '../types/index.js';
import { DiskTreeMirror } from './disk-tree-mirror.js';

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

describe('DiskTreeMirror', () => {
  let workDir: string;
  let dataDir: string;
  let trashDir: string;

  const open = (): NoteTree => unwrap(initializeFromFileSystem(dataDir, trashDir));

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'notetree-disk-'));
    dataDir = join(workDir, 'data');
    trashDir = join(workDir, 'trash');
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('creates both roots on first open', () => {
    open();

    expect(existsSync(dataDir)).toBe(true);
    expect(existsSync(trashDir)).toBe(true);
  });

  it('maps folders to directories and notes to files', () => {
    const tree = open();
    const work = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'Work'));
    unwrap(tree.createNote(work, 'Plan', 'draft'));

    expect(existsSync(join(dataDir, 'Work', '.folder.json'))).toBe(true);
    const text = readFileSync(join(dataDir, 'Work', '1-plan.md'), 'utf-8');
    expect(text.startsWith('---\nid: 1\ntitle: "Plan"\n')).toBe(true);
    expect(text.endsWith('\n---\n\ndraft')).toBe(true);
  });

  it('moves trashed folders into the trash directory', () => {
    const tree = open();
    const work = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'Work'));
    unwrap(tree.createNote(work, 'Plan', 'draft'));

    unwrap(tree.deleteFolder(work));

    expect(existsSync(join(dataDir, 'Work'))).toBe(false);
    expect(existsSync(join(trashDir, 'Work~1', '1-plan.md'))).toBe(true);

    unwrap(tree.emptyTrash());

    expect(existsSync(join(trashDir, 'Work~1'))).toBe(false);
  });

  it('restores a folder that was trashed before a restart', () => {
    const first = open();
    const a = unwrap(first.createFolder(ROOT_FOLDER_ID, 'A'));
    const b = unwrap(first.createFolder(a, 'B'));
    const note = unwrap(first.createNote(b, 'Inside', 'kept'));
    unwrap(first.deleteFolder(b));

    const second = open();

    expect(second.getTrashContents()).toEqual({ notes: [], folders: [{ id: b, name: 'B', originalParentId: a }] });
    expect(unwrap(second.getNote(note)).trashed).toBe(true);

    unwrap(second.restoreItem(b, false));

    expect(existsSync(join(dataDir, 'A', 'B', '1-inside.md'))).toBe(true);
    expect(existsSync(join(trashDir, 'B~2'))).toBe(false);
    expect(unwrap(second.getNote(note)).trashed).toBe(false);
    expect(second.findFolderByPath('/A/B')).toEqual({ ok: true, value: b });
  });

  it('purges an active folder with everything below it', () => {
    const tree = open();
    const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
    const inner = unwrap(tree.createFolder(a, 'Inner'));
    const top = unwrap(tree.createNote(a, 'Top'));
    const nested = unwrap(tree.createNote(inner, 'Nested'));

    unwrap(tree.deleteFolder(a, true));

    expect(tree.getFolder(a).ok).toBe(false);
    expect(tree.getFolder(inner).ok).toBe(false);
    expect(tree.getNote(top).ok).toBe(false);
    expect(tree.getNote(nested).ok).toBe(false);
    expect(tree.getTrashContents()).toEqual({ notes: [], folders: [] });
    expect(existsSync(join(dataDir, 'A'))).toBe(false);
  });

  it('skips directories that carry a note or catalog file name', () => {
    const first = open();
    const a = unwrap(first.createFolder(ROOT_FOLDER_ID, 'A'));
    unwrap(first.createNote(a, 'Plan', 'important'));
    mkdirSync(join(dataDir, 'A', '7-stray.md'));
    mkdirSync(join(dataDir, '.catalog.json'));

    const second = open();

    expect(unwrap(second.listContents(a)).notes.map((note) => note.title)).toEqual(['Plan']);
    expect(unwrap(second.listContents(a)).folders).toEqual([]);
    expect(unwrap(second.listContents(ROOT_FOLDER_ID)).folders.map((folder) => folder.name)).toEqual(['A']);
  });

  it('keeps the tag table and labels in a catalog file', () => {
    const first = open();
    unwrap(first.createTag('spare'));
    unwrap(first.defineColorLabel('red', '#FF0000'));

    expect(JSON.parse(readFileSync(join(dataDir, '.catalog.json'), 'utf-8'))).toEqual({
      tags: [{ id: 1, name: 'spare' }],
      labels: [{ name: 'red', color: '#FF0000' }],
    });

    const second = open();
    expect(second.listTags()).toEqual([{ id: 1, name: 'spare' }]);
    expect(second.listColorLabels()).toEqual([{ name: 'red', color: '#FF0000' }]);
  });

  it('rebuilds the same tree on the next open', () => {
    const first = open();
    const work = unwrap(first.createFolder(ROOT_FOLDER_ID, 'Work'));
    const projects = unwrap(first.createFolder(work, 'Projects'));
    const plan = unwrap(first.createNote(projects, 'Plan', 'line one\nline two', ['urgent']));
    unwrap(first.editNote(plan, { content: 'line one\nline three' }));
    const scratch = unwrap(first.createNote(ROOT_FOLDER_ID, 'Scratch', 'temp'));
    unwrap(first.deleteNote(scratch));

    const second = open();

    expect(second.findFolderByPath('/Work/Projects')).toEqual({ ok: true, value: projects });
    const view = unwrap(second.getNote(plan));
    expect(view.content).toBe('line one\nline three');
    expect(view.tags).toEqual(['urgent']);
    expect(view.versionCount).toBe(1);
    expect(second.getTrashContents().notes.map((note) => [note.id, note.originalParentId])).toEqual([
      [scratch, ROOT_FOLDER_ID],
    ]);
    unwrap(second.restoreItem(scratch, true));
    expect(existsSync(join(dataDir, '2-scratch.md'))).toBe(true);
  });

  it('skips files that do not parse', () => {
    const first = open();
    unwrap(first.createNote(ROOT_FOLDER_ID, 'Good', 'fine'));
    writeFileSync(join(dataDir, '5-broken.md'), 'not a note', 'utf-8');
    writeFileSync(join(dataDir, 'notes.txt'), 'ignored', 'utf-8');

    const second = open();

    expect(unwrap(second.listContents(ROOT_FOLDER_ID)).notes.map((note) => note.title)).toEqual(['Good']);
  });

  it('assigns fresh ids to duplicates found on disk', () => {
    const first = open();
    const a = unwrap(first.createFolder(ROOT_FOLDER_ID, 'A'));
    const b = unwrap(first.createFolder(ROOT_FOLDER_ID, 'B'));
    unwrap(first.createNote(a, 'Plan', 'original'));
    cpSync(join(dataDir, 'A', '1-plan.md'), join(dataDir, 'B', '1-plan.md'));

    const second = open();

    expect(unwrap(second.listContents(a)).notes.map((note) => note.id)).toEqual([1]);
    expect(unwrap(second.listContents(b)).notes.map((note) => note.id)).toEqual([2]);
    expect(existsSync(join(dataDir, 'B', '1-plan.md'))).toBe(false);
    expect(existsSync(join(dataDir, 'B', '2-plan.md'))).toBe(true);
  });

  it('adopts directories created by hand', () => {
    mkdirSync(join(dataDir, 'Manual'), { recursive: true });

    const tree = open();

    expect(tree.findFolderByPath('/Manual')).toEqual({ ok: true, value: 1 });
    expect(existsSync(join(dataDir, 'Manual', '.folder.json'))).toBe(true);
  });

  it('imports and exports notes as plain files', () => {
    const tree = open();
    const source = join(workDir, 'ideas.txt');
    writeFileSync(source, 'buy milk', 'utf-8');

    const imported = unwrap(tree.importNoteFromText(source));
    expect(unwrap(tree.getNote(imported))).toMatchObject({ title: 'ideas', content: 'buy milk' });

    const target = join(workDir, 'ideas.md');
    unwrap(tree.exportNoteToMarkdown(imported, target));
    expect(readFileSync(target, 'utf-8').split('\n')[0]).toBe('# ideas');

    const json = join(workDir, 'ideas.json');
    unwrap(tree.exportNoteToJson(imported, json));
    expect(JSON.parse(readFileSync(json, 'utf-8'))).toMatchObject({ id: imported, title: 'ideas' });

    const missing = tree.importNoteFromText(join(workDir, 'missing.txt'));
    expect(missing.ok ? undefined : missing.error.code).toBe('IO_ERROR');
  });

  it('resolves mirror paths under the configured roots', () => {
    const mirror = new DiskTreeMirror(dataDir, trashDir);

    expect(mirror.resolvePath({ root: 'trash', segments: ['A~1', '2-x.md'] })).toBe(join(trashDir, 'A~1', '2-x.md'));
    expect(mirror.basePath).toBe(dataDir);
  });
});
