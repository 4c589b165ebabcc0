import type { Note, SearchCriteria, SearchScope } from '../types/index.js';
import type { TreeRoot } from '../repositories/tree-mirror.js';

/**
 * What the search engine needs from the tree: notes in traversal order, and tag names.
 */
export interface SearchSource {
  notesInOrder(root: TreeRoot): Note[];
  tagNamesOf(note: Note): string[];
}

function rootsFor(scope: SearchScope): TreeRoot[] {
  switch (scope) {
    case 'active':
      return ['active'];
    case 'trash':
      return ['trash'];
    case 'all':
      return ['active', 'trash'];
  }
}

export function matchesCriteria(note: Note, tagNames: readonly string[], criteria: SearchCriteria): boolean {
  const keyword = criteria.keyword ?? '';
  if (keyword && !note.title.includes(keyword) && !note.content.includes(keyword)) {
    return false;
  }

  const required = criteria.tags ?? [];
  if (!required.every((tag) => tagNames.includes(tag))) {
    return false;
  }

  const modified = note.modifiedAt.getTime();
  if (criteria.modifiedFrom && modified < criteria.modifiedFrom.getTime()) {
    return false;
  }
  if (criteria.modifiedTo && modified > criteria.modifiedTo.getTime()) {
    return false;
  }

  return true;
}

/**
 * Linear scan over the selected tree(s). Results keep traversal order:
 * a folder's notes come before its subfolders' notes, the active tree before the trash.
 */
export function searchNotes(source: SearchSource, criteria: SearchCriteria): Note[] {
  const results: Note[] = [];
  for (const root of rootsFor(criteria.scope ?? 'active')) {
    for (const note of source.notesInOrder(root)) {
      if (matchesCriteria(note, source.tagNamesOf(note), criteria)) {
        results.push(note);
      }
    }
  }
  return results;
}
