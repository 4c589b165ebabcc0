import { marked } from 'marked';

import type { NoteView } from '../types/index.js';

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderMarkdown(note: NoteView): string {
  const lines = [`# ${note.title}`, ''];
  if (note.tags.length > 0) {
    lines.push(`Tags: ${note.tags.map((tag) => `#${tag}`).join(' ')}`, '');
  }
  lines.push(`Created: ${note.createdAt.toISOString()}`);
  lines.push(`Modified: ${note.modifiedAt.toISOString()}`, '');
  lines.push(note.content);
  return lines.join('\n');
}

export function renderJson(note: NoteView): string {
  return JSON.stringify(
    {
      id: note.id,
      title: note.title,
      content: note.content,
      tags: note.tags,
      createdAt: note.createdAt.toISOString(),
      modifiedAt: note.modifiedAt.toISOString(),
      wordCount: note.wordCount,
      charCount: note.charCount,
      encrypted: note.encrypted,
      attachments: note.attachments,
      reminders: note.reminders.map((reminder) => ({
        dueAt: reminder.dueAt.toISOString(),
        description: reminder.description,
        completed: reminder.completed,
      })),
      colorLabel: note.colorLabel,
    },
    null,
    2
  );
}

export function renderHtml(note: NoteView): string {
  const body = marked.parse(note.content, { async: false, breaks: true });
  if (typeof body !== 'string') {
    throw new Error('Markdown renderer returned a promise');
  }

  const title = escapeHtml(note.title);
  const tags = note.tags.length
    ? `<p class="tags">${note.tags.map((tag) => `<span class="tag">${escapeHtml(tag)}</span>`).join(' ')}</p>\n`
    : '';

  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${title}</title>`,
    '</head>',
    '<body>',
    `<h1>${title}</h1>`,
    `${tags}<article>`,
    body.trimEnd(),
    '</article>',
    '</body>',
    '</html>',
  ].join('\n');
}
