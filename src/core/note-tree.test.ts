import { beforeEach, describe, expect, it } from 'vitest';

import { IOError } from '../errors.js';
import { MemoryTreeMirror } from '../repositories/memory-tree-mirror.js';
import { describePath, type MirrorPath } from '../repositories/tree-mirror.js';
import { ROOT_FOLDER_ID, TRASH_FOLDER_ID } from '../types/index.js';
import { NoteTree } from './note-tree.js';
import type { Result } from './result.js';

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

function errorCode<T>(result: Result<T>): string | undefined {
  return result.ok ? undefined : result.error.code;
}

class FailingMirror extends MemoryTreeMirror {
  failing = false;

  protected override writeText(path: MirrorPath, text: string): void {
    if (this.failing) {
      throw new IOError('write', describePath(path), 'disk full');
    }
    super.writeText(path, text);
  }
}

describe('NoteTree', () => {
  let mirror: MemoryTreeMirror;
  let tree: NoteTree;
  let clock: Date;

  beforeEach(() => {
    clock = new Date('2024-05-01T08:00:00Z');
    mirror = new MemoryTreeMirror();
    tree = new NoteTree({ mirror, now: () => clock });
  });

  describe('folders and notes', () => {
    it('allocates folder and note ids from separate counters', () => {
      const work = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'Work'));
      const plan = unwrap(tree.createNote(work, 'Plan', 'draft'));

      expect(work).toBe(1);
      expect(plan).toBe(1);

      const contents = unwrap(tree.listContents(work));
      expect(contents.notes.map((note) => note.title)).toEqual(['Plan']);
      expect(contents.folders).toEqual([]);
      expect(mirror.files('active')).toEqual(['Work/.folder.json', 'Work/1-plan.md']);
    });

    it('lists notes before folders in insertion order', () => {
      const work = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'Work'));
      unwrap(tree.createFolder(work, 'Later'));
      unwrap(tree.createFolder(work, 'Earlier'));
      unwrap(tree.createNote(work, 'B'));
      unwrap(tree.createNote(work, 'A'));

      const contents = unwrap(tree.listContents(work));
      expect(contents.notes.map((note) => note.title)).toEqual(['B', 'A']);
      expect(contents.folders.map((folder) => folder.name)).toEqual(['Later', 'Earlier']);
    });

    it('rejects duplicate and invalid folder names', () => {
      unwrap(tree.createFolder(ROOT_FOLDER_ID, 'Work'));

      expect(errorCode(tree.createFolder(ROOT_FOLDER_ID, 'Work'))).toBe('DUPLICATE_NAME');
      expect(errorCode(tree.createFolder(ROOT_FOLDER_ID, '  '))).toBe('INVALID_NAME');
      expect(errorCode(tree.createFolder(ROOT_FOLDER_ID, 'a/b'))).toBe('INVALID_NAME');
      expect(errorCode(tree.createFolder(ROOT_FOLDER_ID, '..'))).toBe('INVALID_NAME');
      expect(errorCode(tree.createFolder(42, 'Orphan'))).toBe('NOT_FOUND');
    });

    it('rejects folder names the mirror uses for its own files', () => {
      const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));

      expect(errorCode(tree.createFolder(a, '1-plan.md'))).toBe('INVALID_NAME');
      expect(errorCode(tree.createFolder(a, '.folder.json'))).toBe('INVALID_NAME');
      expect(errorCode(tree.createFolder(ROOT_FOLDER_ID, '.catalog.json'))).toBe('INVALID_NAME');
      expect(errorCode(tree.renameFolder(a, 'notes.md'))).toBe('INVALID_NAME');
      expect(unwrap(tree.listContents(a)).folders).toEqual([]);

      unwrap(tree.createNote(a, 'Plan', 'important'));
      expect(mirror.files('active')).toEqual(['A/.folder.json', 'A/1-plan.md']);
    });

    it('never hands out an id twice, even after a purge', () => {
      const first = unwrap(tree.createNote(ROOT_FOLDER_ID, 'First'));
      unwrap(tree.deleteNote(first, true));
      const second = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Second'));

      expect(second).toBe(2);
      expect(errorCode(tree.getNote(first))).toBe('NOT_FOUND');
    });

    it('renames a note file when the title changes', () => {
      const plan = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Plan', 'draft'));

      unwrap(tree.renameNote(plan, 'Roadmap'));

      expect(unwrap(tree.getNote(plan)).title).toBe('Roadmap');
      expect(mirror.files('active')).toEqual(['1-roadmap.md']);
    });

    it('moves notes between folders', () => {
      const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
      const b = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'B'));
      const note = unwrap(tree.createNote(a, 'Plan'));

      unwrap(tree.moveNote(note, b));

      expect(unwrap(tree.listContents(a)).notes).toEqual([]);
      expect(unwrap(tree.getNote(note)).folderId).toBe(b);
      expect(mirror.files('active')).toEqual(['A/.folder.json', 'B/.folder.json', 'B/1-plan.md']);
    });

    it('reports folder statistics', () => {
      const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
      const b = unwrap(tree.createFolder(a, 'B'));
      unwrap(tree.createNote(a, 'One'));
      unwrap(tree.createNote(b, 'Two'));
      unwrap(tree.createNote(b, 'Three'));

      const info = unwrap(tree.getFolder(a));
      expect(info).toMatchObject({
        id: a,
        name: 'A',
        parentId: ROOT_FOLDER_ID,
        path: '/A',
        noteCount: 1,
        subfolderCount: 1,
        totalNoteCount: 3,
      });
    });
  });

  describe('moving and renaming folders', () => {
    it('refuses to move a folder into its own subtree', () => {
      const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
      const b = unwrap(tree.createFolder(a, 'B'));
      const before = mirror.directories('active');

      expect(errorCode(tree.moveFolder(a, b))).toBe('CYCLE');
      expect(errorCode(tree.moveFolder(a, a))).toBe('CYCLE');

      expect(unwrap(tree.listContents(ROOT_FOLDER_ID)).folders.map((folder) => folder.id)).toEqual([a]);
      expect(unwrap(tree.getFolder(b)).parentId).toBe(a);
      expect(mirror.directories('active')).toEqual(before);
    });

    it('keeps descendant paths resolvable after a rename', () => {
      const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
      const b = unwrap(tree.createFolder(a, 'B'));
      const note = unwrap(tree.createNote(b, 'N'));

      unwrap(tree.renameFolder(a, 'C'));

      expect(tree.findFolderByPath('/C/B')).toEqual({ ok: true, value: b });
      expect(errorCode(tree.findFolderByPath('/A/B'))).toBe('NOT_FOUND');
      expect(mirror.files('active')).toEqual(['C/.folder.json', 'C/B/.folder.json', 'C/B/1-n.md']);
      expect(mirror.notePath(note)?.segments).toEqual(['C', 'B', '1-n.md']);
    });

    it('keeps descendant paths resolvable after a move', () => {
      const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
      const b = unwrap(tree.createFolder(a, 'B'));
      const target = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'Archive'));

      unwrap(tree.moveFolder(a, target));

      expect(tree.findFolderByPath('/Archive/A/B')).toEqual({ ok: true, value: b });
      expect(errorCode(tree.findFolderByPath('/A'))).toBe('NOT_FOUND');
      expect(mirror.directories('active')).toEqual(['Archive', 'Archive/A', 'Archive/A/B']);
    });

    it('rejects a move onto an existing sibling name', () => {
      const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
      const target = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'T'));
      unwrap(tree.createFolder(target, 'A'));

      expect(errorCode(tree.moveFolder(a, target))).toBe('DUPLICATE_NAME');
      expect(errorCode(tree.renameFolder(target, 'A'))).toBe('DUPLICATE_NAME');
    });

    it('renames and moves in one step', () => {
      const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
      const target = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'T'));

      unwrap(tree.updateFolder(a, { name: 'Moved', parentId: target }));

      expect(tree.getFolderPath(a)).toEqual({ ok: true, value: '/T/Moved' });
      expect(mirror.directories('active')).toEqual(['T', 'T/Moved']);
    });

    it('leaves the name alone when the move half of an update fails', () => {
      const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
      const b = unwrap(tree.createFolder(a, 'B'));

      expect(errorCode(tree.updateFolder(a, { name: 'C', parentId: b }))).toBe('CYCLE');

      expect(unwrap(tree.getFolder(a)).name).toBe('A');
      expect(mirror.directories('active')).toEqual(['A', 'A/B']);
    });

    it('does not move or rename the roots', () => {
      expect(errorCode(tree.renameFolder(ROOT_FOLDER_ID, 'Top'))).toBe('INVALID_OPERATION');
      expect(errorCode(tree.deleteFolder(ROOT_FOLDER_ID))).toBe('INVALID_OPERATION');
      expect(errorCode(tree.deleteFolder(TRASH_FOLDER_ID))).toBe('INVALID_OPERATION');
    });
  });

  describe('navigation', () => {
    it('resolves absolute and relative paths', () => {
      const work = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'Work'));
      const projects = unwrap(tree.createFolder(work, 'Projects'));

      expect(tree.changeCurrentFolder('Work')).toEqual({ ok: true, value: work });
      expect(tree.changeCurrentFolder('./Projects')).toEqual({ ok: true, value: projects });
      expect(tree.getCurrentPath()).toBe('/Work/Projects');
      expect(tree.changeCurrentFolder('..')).toEqual({ ok: true, value: work });
      expect(tree.changeCurrentFolder('/../..')).toEqual({ ok: true, value: ROOT_FOLDER_ID });
      expect(tree.getCurrentPath()).toBe('/');
    });

    it('stays put when a path does not resolve', () => {
      const work = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'Work'));
      unwrap(tree.changeCurrentFolder('/Work'));

      expect(errorCode(tree.changeCurrentFolder('Missing'))).toBe('NOT_FOUND');
      expect(tree.getCurrentFolderId()).toBe(work);
    });

    it('returns to the root when the current folder is trashed', () => {
      const work = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'Work'));
      unwrap(tree.createFolder(work, 'Inner'));
      unwrap(tree.changeCurrentFolder('/Work/Inner'));

      unwrap(tree.deleteFolder(work));

      expect(tree.getCurrentFolderId()).toBe(ROOT_FOLDER_ID);
    });
  });

  describe('trash', () => {
    it('restores a trashed note to its original folder', () => {
      const work = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'Work'));
      const plan = unwrap(tree.createNote(work, 'Plan', 'draft'));

      unwrap(tree.deleteNote(plan));

      expect(unwrap(tree.listContents(work)).notes).toEqual([]);
      const trash = tree.getTrashContents();
      expect(trash.notes.map((note) => [note.id, note.originalParentId])).toEqual([[plan, work]]);
      expect(mirror.files('trash')).toEqual(['1-plan.md']);

      unwrap(tree.restoreItem(plan, true));

      expect(unwrap(tree.listContents(work)).notes.map((note) => note.id)).toEqual([plan]);
      expect(tree.getTrashContents().notes).toEqual([]);
      expect(mirror.files('trash')).toEqual([]);
      expect(mirror.files('active')).toEqual(['Work/.folder.json', 'Work/1-plan.md']);
    });

    it('moves a deleted folder with its contents under the trash root', () => {
      const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
      const note = unwrap(tree.createNote(a, 'Note'));

      unwrap(tree.deleteFolder(a));

      expect(mirror.files('trash')).toEqual(['A~1/.folder.json', 'A~1/1-note.md']);
      expect(mirror.directories('active')).toEqual([]);
      expect(tree.getFolderPath(a)).toEqual({ ok: true, value: 'trash:/A' });
      expect(unwrap(tree.getNote(note)).trashed).toBe(true);
      expect(errorCode(tree.editNote(note, { content: 'x' }))).toBe('INVALID_OPERATION');
      expect(errorCode(tree.createNote(a, 'Another'))).toBe('INVALID_OPERATION');

      unwrap(tree.restoreItem(a, false));

      expect(unwrap(tree.getNote(note)).trashed).toBe(false);
      expect(mirror.files('active')).toEqual(['A/.folder.json', 'A/1-note.md']);
    });

    it('only restores top-level trash entries', () => {
      const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
      const note = unwrap(tree.createNote(a, 'Note'));
      unwrap(tree.deleteFolder(a));

      expect(errorCode(tree.restoreItem(note, true))).toBe('NOT_FOUND');
      expect(errorCode(tree.restoreItem(a, true))).toBe('NOT_FOUND');
    });

    it('keeps an item in the trash when its original parent is gone', () => {
      const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
      const b = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'B'));
      const inA = unwrap(tree.createNote(a, 'One'));
      const inB = unwrap(tree.createNote(b, 'Two'));
      unwrap(tree.deleteNote(inA));
      unwrap(tree.deleteNote(inB));
      unwrap(tree.deleteFolder(a, true));
      unwrap(tree.deleteFolder(b));

      expect(errorCode(tree.restoreItem(inA, true))).toBe('ORIGINAL_PARENT_GONE');
      expect(errorCode(tree.restoreItem(inB, true))).toBe('ORIGINAL_PARENT_GONE');
      expect(tree.getTrashContents().notes.map((note) => note.id)).toEqual([inA, inB]);
    });

    it('refuses to restore a folder over a sibling with the same name', () => {
      const first = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
      unwrap(tree.deleteFolder(first));
      unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));

      expect(errorCode(tree.restoreItem(first, false))).toBe('DUPLICATE_NAME');
      expect(tree.getTrashContents().folders.map((folder) => folder.id)).toEqual([first]);
    });

    it('purges everything on emptyTrash', () => {
      const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
      const inner = unwrap(tree.createFolder(a, 'Inner'));
      const nested = unwrap(tree.createNote(inner, 'Nested'));
      const loose = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Loose'));
      unwrap(tree.deleteFolder(a));
      unwrap(tree.deleteNote(loose));

      expect(tree.emptyTrash()).toEqual({ ok: true, value: { notes: 2, folders: 2 } });

      expect(errorCode(tree.getFolder(a))).toBe('NOT_FOUND');
      expect(errorCode(tree.getFolder(inner))).toBe('NOT_FOUND');
      expect(errorCode(tree.getNote(nested))).toBe('NOT_FOUND');
      expect(errorCode(tree.getNote(loose))).toBe('NOT_FOUND');
      expect(tree.getTrashContents()).toEqual({ notes: [], folders: [] });
      expect(mirror.files('trash')).toEqual([]);
      expect(mirror.directories('trash')).toEqual([]);
    });

    it('gives equally named trashed folders separate directories', () => {
      const x = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'X'));
      const first = unwrap(tree.createFolder(x, 'Docs'));
      const y = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'Y'));
      const second = unwrap(tree.createFolder(y, 'Docs'));

      unwrap(tree.deleteFolder(first));
      unwrap(tree.deleteFolder(second));

      expect(mirror.directories('trash')).toEqual([`Docs~${first}`, `Docs~${second}`]);
    });
  });

  describe('versions', () => {
    it('snapshots the content before every overwrite', () => {
      const note = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Plan', 'v1'));

      clock = new Date('2024-05-02T08:00:00Z');
      unwrap(tree.editNote(note, { content: 'v2' }));
      clock = new Date('2024-05-03T08:00:00Z');
      unwrap(tree.editNote(note, { content: 'v3' }));

      const history = unwrap(tree.getHistory(note));
      expect(history).toEqual([
        { timestamp: new Date('2024-05-02T08:00:00Z'), content: 'v1' },
        { timestamp: new Date('2024-05-03T08:00:00Z'), content: 'v2' },
      ]);
      expect(unwrap(tree.getNote(note)).modifiedAt).toEqual(new Date('2024-05-03T08:00:00Z'));
    });

    it('skips the snapshot when the content does not change', () => {
      const note = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Plan', 'same'));

      unwrap(tree.editNote(note, { content: 'same' }));

      expect(unwrap(tree.getHistory(note))).toEqual([]);
    });

    it('pushes the pre-revert content when reverting', () => {
      const note = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Plan', 'v1'));
      unwrap(tree.editNote(note, { content: 'v2' }));

      unwrap(tree.revertToVersion(note, 0));

      expect(unwrap(tree.getNote(note)).content).toBe('v1');
      expect(unwrap(tree.getHistory(note)).map((version) => version.content)).toEqual(['v1', 'v2']);
    });

    it('leaves the content alone for an out-of-range index', () => {
      const note = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Plan', 'v1'));
      unwrap(tree.editNote(note, { content: 'v2' }));

      expect(errorCode(tree.revertToVersion(note, 1))).toBe('INDEX_OUT_OF_RANGE');
      expect(errorCode(tree.revertToVersion(note, -1))).toBe('INDEX_OUT_OF_RANGE');
      expect(unwrap(tree.getNote(note)).content).toBe('v2');
      expect(unwrap(tree.getHistory(note))).toHaveLength(1);
    });

    it('recomputes counts on edit', () => {
      const note = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Plan', 'one'));

      unwrap(tree.editNote(note, { content: 'one two three' }));

      const view = unwrap(tree.getNote(note));
      expect(view.wordCount).toBe(3);
      expect(view.charCount).toBe(13);
    });
  });

  describe('tags', () => {
    it('drops the tag from the active set once no note carries it', () => {
      const note = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Plan'));

      expect(tree.addTagToNote(note, 'urgent')).toEqual({ ok: true, value: 1 });
      expect(tree.getAllTags()).toEqual([{ id: 1, name: 'urgent' }]);

      unwrap(tree.removeTagFromNote(note, 'urgent'));

      expect(unwrap(tree.getNote(note)).tags).toEqual([]);
      expect(tree.getAllTags()).toEqual([]);
      expect(tree.listTags()).toEqual([{ id: 1, name: 'urgent' }]);
      expect(errorCode(tree.removeTagFromNote(note, 'urgent'))).toBe('NOT_FOUND');
    });

    it('ignores tags referenced only from the trash', () => {
      const trashed = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Old', '', ['old']));
      unwrap(tree.createNote(ROOT_FOLDER_ID, 'New', '', ['new']));
      unwrap(tree.deleteNote(trashed));

      expect(tree.getAllTags().map((tag) => tag.name)).toEqual(['new']);
    });

    it('purges a deleted tag from every note and its file', () => {
      const note = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Plan', 'body', ['a', 'b']));

      unwrap(tree.deleteTag('a'));

      expect(unwrap(tree.getNote(note)).tags).toEqual(['b']);
      expect(mirror.readFile('active', '1-plan.md')?.split('\n')).toContain('tags: ["b"]');
      expect(errorCode(tree.deleteTag('a'))).toBe('NOT_FOUND');
    });

    it('rejects creating an existing tag', () => {
      unwrap(tree.createTag('work'));

      expect(errorCode(tree.createTag('work'))).toBe('DUPLICATE_NAME');
    });
  });

  describe('search', () => {
    it('returns notes in traversal order', () => {
      const a = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'A'));
      unwrap(tree.createNote(a, 'Deep plan'));
      unwrap(tree.createNote(ROOT_FOLDER_ID, 'Top plan'));
      unwrap(tree.createNote(ROOT_FOLDER_ID, 'Unrelated'));

      expect(tree.searchNotesByKeyword('plan').map((note) => note.title)).toEqual(['Top plan', 'Deep plan']);
    });

    it('filters by tag across scopes', () => {
      const kept = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Kept', '', ['x']));
      const trashed = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Trashed', '', ['x']));
      unwrap(tree.deleteNote(trashed));

      expect(tree.searchNotesByTag('x').map((note) => note.id)).toEqual([kept]);
      expect(tree.search({ tags: ['x'], scope: 'all' }).map((note) => note.id)).toEqual([kept, trashed]);
    });
  });

  describe('note extras', () => {
    it('tracks attachments and reminders', () => {
      const note = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Plan'));

      unwrap(tree.addAttachment(note, 'files/diagram.png'));
      unwrap(tree.addAttachment(note, 'files/diagram.png'));
      expect(unwrap(tree.getNote(note)).attachments).toEqual(['files/diagram.png']);
      expect(errorCode(tree.removeAttachment(note, 'missing.png'))).toBe('NOT_FOUND');

      expect(tree.addReminder(note, new Date('2024-06-01T09:00:00Z'), 'review')).toEqual({ ok: true, value: 0 });
      unwrap(tree.completeReminder(note, 0));
      expect(errorCode(tree.completeReminder(note, 1))).toBe('INDEX_OUT_OF_RANGE');
      expect(unwrap(tree.getNote(note)).reminders).toEqual([
        { dueAt: new Date('2024-06-01T09:00:00Z'), description: 'review', completed: true },
      ]);
    });

    it('assigns only defined color labels', () => {
      const note = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Plan'));

      expect(errorCode(tree.setColorLabel(note, 'Red'))).toBe('NOT_FOUND');

      unwrap(tree.defineColorLabel('Red', '#ff0000'));
      unwrap(tree.setColorLabel(note, 'Red'));
      expect(unwrap(tree.getNote(note)).colorLabel).toEqual({ name: 'Red', color: '#FF0000' });

      unwrap(tree.setColorLabel(note, null));
      expect(unwrap(tree.getNote(note)).colorLabel).toBeNull();
    });

    it('encrypts and decrypts content without recording history', () => {
      const note = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Secret', 'the plan'));

      unwrap(tree.encryptNote(note, 'test-secret'));
      const encrypted = unwrap(tree.getNote(note));
      expect(encrypted.encrypted).toBe(true);
      expect(encrypted.content).not.toBe('the plan');
      expect(errorCode(tree.encryptNote(note, 'test-secret'))).toBe('INVALID_OPERATION');
      expect(errorCode(tree.decryptNote(note, 'wrong-secret'))).toBe('DECRYPTION_FAILED');

      unwrap(tree.decryptNote(note, 'test-secret'));
      const decrypted = unwrap(tree.getNote(note));
      expect(decrypted.content).toBe('the plan');
      expect(decrypted.encrypted).toBe(false);
      expect(decrypted.wordCount).toBe(2);
      expect(unwrap(tree.getHistory(note))).toEqual([]);
    });

    it('renders a note as HTML', () => {
      const note = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Plan', '**bold**'));

      expect(unwrap(tree.convertNoteToHtml(note))).toContain('<p><strong>bold</strong></p>');
    });
  });

  describe('load', () => {
    it('rebuilds both trees from the mirror', () => {
      const work = unwrap(tree.createFolder(ROOT_FOLDER_ID, 'Work'));
      const plan = unwrap(tree.createNote(work, 'Plan', 'draft\n\nsecond paragraph', ['urgent']));
      unwrap(tree.editNote(plan, { content: 'final' }));
      const old = unwrap(tree.createFolder(work, 'Old'));
      unwrap(tree.deleteFolder(old));

      const reloaded = new NoteTree({ mirror, now: () => clock });
      expect(reloaded.load()).toEqual({ ok: true, value: { notes: 1, folders: 2 } });

      const view = unwrap(reloaded.getNote(plan));
      expect(view.content).toBe('final');
      expect(view.tags).toEqual(['urgent']);
      expect(unwrap(reloaded.getHistory(plan)).map((version) => version.content)).toEqual([
        'draft\n\nsecond paragraph',
      ]);
      expect(reloaded.findFolderByPath('/Work')).toEqual({ ok: true, value: work });
      expect(reloaded.getTrashContents().folders).toEqual([{ id: old, name: 'Old', originalParentId: work }]);

      unwrap(reloaded.restoreItem(old, false));
      expect(reloaded.findFolderByPath('/Work/Old')).toEqual({ ok: true, value: old });
      expect(reloaded.createFolder(ROOT_FOLDER_ID, 'Next')).toEqual({ ok: true, value: 3 });
    });

    it('keeps unreferenced tags and label colors across a reload', () => {
      unwrap(tree.defineColorLabel('red', '#FF0000'));
      unwrap(tree.defineColorLabel('blue', '#0000FF'));
      const note = unwrap(tree.createNote(ROOT_FOLDER_ID, 'Plan'));
      unwrap(tree.setColorLabel(note, 'red'));
      unwrap(tree.defineColorLabel('red', '#00FF00'));
      unwrap(tree.createTag('spare'));

      const reloaded = new NoteTree({ mirror, now: () => clock });
      unwrap(reloaded.load());

      expect(reloaded.listColorLabels()).toEqual([
        { name: 'red', color: '#00FF00' },
        { name: 'blue', color: '#0000FF' },
      ]);
      expect(unwrap(reloaded.getNote(note)).colorLabel).toEqual({ name: 'red', color: '#00FF00' });
      expect(reloaded.listTags()).toEqual([{ id: 1, name: 'spare' }]);
      expect(reloaded.createTag('next')).toEqual({ ok: true, value: 2 });
    });

    it('refuses to load into a populated tree', () => {
      unwrap(tree.createFolder(ROOT_FOLDER_ID, 'Work'));

      expect(errorCode(tree.load())).toBe('INVALID_OPERATION');
    });
  });

  describe('mirror failures', () => {
    it('reports an IOError but keeps the in-memory change', () => {
      const failing = new FailingMirror();
      const fragile = new NoteTree({ mirror: failing, now: () => clock });
      failing.failing = true;

      const created = fragile.createNote(ROOT_FOLDER_ID, 'Plan', 'draft');

      expect(errorCode(created)).toBe('IO_ERROR');
      expect(unwrap(fragile.getNote(1)).title).toBe('Plan');
    });
  });
});
