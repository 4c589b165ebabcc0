import type { FastifyInstance, FastifyReply } from 'fastify';
import { z, ZodError } from 'zod';

import type { NoteTree } from '../core/note-tree.js';
import type { Result } from '../core/result.js';
import type { NoteTreeError } from '../errors.js';
import { renderJson, renderMarkdown } from '../export/formatters.js';
import type { JsonSettingsStore } from '../storage/json-settings-store.js';
import type { AppConfig } from '../types/index.js';

export const LAST_FOLDER_SETTING = 'lastFolderPath';

const idParams = z.object({ id: z.coerce.number().int() });
const permanentQuery = z.object({
  permanent: z.enum(['true', 'false']).default('false').transform((value) => value === 'true'),
});

const createFolderBody = z.object({
  parentId: z.number().int().optional(),
  name: z.string(),
});
const updateFolderBody = z.object({
  name: z.string().optional(),
  parentId: z.number().int().optional(),
});
const changeFolderBody = z.object({ path: z.string().min(1) });

const createNoteBody = z.object({
  folderId: z.number().int().optional(),
  title: z.string(),
  content: z.string().default(''),
  tags: z.array(z.string()).default([]),
});
const updateNoteBody = z.object({
  title: z.string().optional(),
  content: z.string().optional(),
  tags: z.array(z.string()).optional(),
});
const moveNoteBody = z.object({ folderId: z.number().int() });
const revertBody = z.object({ index: z.number().int() });
const tagBody = z.object({ name: z.string() });
const attachmentBody = z.object({ path: z.string().min(1) });
const reminderBody = z.object({ dueAt: z.string().datetime({ offset: true }), description: z.string() });
const reminderParams = z.object({ id: z.coerce.number().int(), index: z.coerce.number().int() });
const colorLabelBody = z.object({ name: z.string().nullable() });
const labelBody = z.object({ name: z.string(), color: z.string() });
const passphraseBody = z.object({ passphrase: z.string().min(1) });
const exportQuery = z.object({ format: z.enum(['md', 'json', 'html']).default('md') });
const restoreBody = z.object({ id: z.number().int(), type: z.enum(['note', 'folder']) });
const importBody = z.object({ filePath: z.string().min(1), folderId: z.number().int().optional() });

const epochBound = z.coerce
  .number()
  .int()
  .nonnegative()
  .optional()
  .transform((value) => (value ? new Date(value) : undefined));
const searchQuery = z.object({
  q: z.string().optional(),
  tags: z
    .string()
    .optional()
    .transform((value) => (value ? value.split(',').map((tag) => tag.trim()).filter(Boolean) : [])),
  from: epochBound,
  to: epochBound,
  scope: z.enum(['active', 'trash', 'all']).default('active'),
});

function statusFor(error: NoteTreeError): number {
  switch (error.code) {
    case 'NOT_FOUND':
      return 404;
    case 'DUPLICATE_NAME':
    case 'CYCLE':
    case 'ORIGINAL_PARENT_GONE':
    case 'INVALID_OPERATION':
      return 409;
    case 'INVALID_NAME':
    case 'INDEX_OUT_OF_RANGE':
    case 'DECRYPTION_FAILED':
    case 'PARSE_ERROR':
      return 400;
    case 'IO_ERROR':
      return 500;
  }
}

/**
 * Turn an operation outcome into a response body, setting the status code.
 */
function respond<T>(reply: FastifyReply, result: Result<T>, onSuccess: (value: T) => unknown, status = 200): unknown {
  if (!result.ok) {
    reply.code(statusFor(result.error));
    return { error: result.error.message, code: result.error.code };
  }
  reply.code(status);
  return onSuccess(result.value);
}

const done = () => ({ ok: true });

export async function registerRoutes(
  app: FastifyInstance,
  tree: NoteTree,
  settings: JsonSettingsStore,
  config: AppConfig
) {
  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof ZodError) {
      reply.code(400).send({
        error: error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; '),
        code: 'VALIDATION_ERROR',
      });
      return;
    }
    reply.send(error);
  });

  // Health check
  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Get current configuration
  app.get('/config', async () => {
    return {
      dataPath: config.dataPath,
      trashPath: config.trashPath,
      server: config.server,
    };
  });

  // ---- Folders ----

  app.get('/folders/current', async () => {
    return { id: tree.getCurrentFolderId(), path: tree.getCurrentPath() };
  });

  app.put('/folders/current', async (request, reply) => {
    const { path } = changeFolderBody.parse(request.body);
    const result = tree.changeCurrentFolder(path);
    if (result.ok) {
      settings.set(LAST_FOLDER_SETTING, tree.getCurrentPath());
      await settings.save();
    }
    return respond(reply, result, (id) => ({ id, path: tree.getCurrentPath() }));
  });

  app.get('/folders/resolve', async (request, reply) => {
    const { path } = changeFolderBody.parse(request.query);
    return respond(reply, tree.findFolderByPath(path), (id) => ({ id }));
  });

  app.get('/folders/:id', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    return respond(reply, tree.getFolder(id), (info) => info);
  });

  app.get('/folders/:id/contents', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    return respond(reply, tree.listContents(id), (contents) => contents);
  });

  app.post('/folders', async (request, reply) => {
    const body = createFolderBody.parse(request.body);
    const result = tree.createFolder(body.parentId ?? tree.getCurrentFolderId(), body.name);
    return respond(reply, result, (id) => ({ id }), 201);
  });

  app.patch('/folders/:id', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const changes = updateFolderBody.parse(request.body);
    const updated = tree.updateFolder(id, changes);
    if (!updated.ok) return respond(reply, updated, done);
    return respond(reply, tree.getFolder(id), (info) => info);
  });

  app.delete('/folders/:id', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const { permanent } = permanentQuery.parse(request.query);
    return respond(reply, tree.deleteFolder(id, permanent), done);
  });

  // ---- Notes ----

  app.post('/notes', async (request, reply) => {
    const body = createNoteBody.parse(request.body);
    const result = tree.createNote(body.folderId ?? tree.getCurrentFolderId(), body.title, body.content, body.tags);
    return respond(reply, result, (id) => ({ id }), 201);
  });

  app.get('/notes/:id', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    return respond(reply, tree.getNote(id), (note) => note);
  });

  app.patch('/notes/:id', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const changes = updateNoteBody.parse(request.body);
    const edited = tree.editNote(id, changes);
    if (!edited.ok) return respond(reply, edited, done);
    return respond(reply, tree.getNote(id), (note) => note);
  });

  app.post('/notes/:id/move', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const { folderId } = moveNoteBody.parse(request.body);
    return respond(reply, tree.moveNote(id, folderId), done);
  });

  app.delete('/notes/:id', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const { permanent } = permanentQuery.parse(request.query);
    return respond(reply, tree.deleteNote(id, permanent), done);
  });

  app.get('/notes/:id/versions', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    return respond(reply, tree.getHistory(id), (history) => history);
  });

  app.post('/notes/:id/revert', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const { index } = revertBody.parse(request.body);
    return respond(reply, tree.revertToVersion(id, index), done);
  });

  app.post('/notes/:id/tags', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const { name } = tagBody.parse(request.body);
    return respond(reply, tree.addTagToNote(id, name), (tagId) => ({ id: tagId }));
  });

  app.delete<{ Params: { id: string; name: string } }>('/notes/:id/tags/:name', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    return respond(reply, tree.removeTagFromNote(id, request.params.name), done);
  });

  app.post('/notes/:id/attachments', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const { path } = attachmentBody.parse(request.body);
    return respond(reply, tree.addAttachment(id, path), done);
  });

  app.delete('/notes/:id/attachments', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const { path } = attachmentBody.parse(request.body);
    return respond(reply, tree.removeAttachment(id, path), done);
  });

  app.post('/notes/:id/reminders', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const body = reminderBody.parse(request.body);
    return respond(reply, tree.addReminder(id, new Date(body.dueAt), body.description), (index) => ({ index }), 201);
  });

  app.post('/notes/:id/reminders/:index/complete', async (request, reply) => {
    const { id, index } = reminderParams.parse(request.params);
    return respond(reply, tree.completeReminder(id, index), done);
  });

  app.put('/notes/:id/color-label', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const { name } = colorLabelBody.parse(request.body);
    return respond(reply, tree.setColorLabel(id, name), done);
  });

  app.post('/notes/:id/encrypt', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const { passphrase } = passphraseBody.parse(request.body);
    return respond(reply, tree.encryptNote(id, passphrase), done);
  });

  app.post('/notes/:id/decrypt', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const { passphrase } = passphraseBody.parse(request.body);
    return respond(reply, tree.decryptNote(id, passphrase), done);
  });

  app.get('/notes/:id/export', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const { format } = exportQuery.parse(request.query);
    if (format === 'html') {
      return respond(reply.type('text/html; charset=utf-8'), tree.convertNoteToHtml(id), (html) => html);
    }
    const note = tree.getNote(id);
    if (format === 'json') {
      return respond(reply.type('application/json; charset=utf-8'), note, renderJson);
    }
    return respond(reply.type('text/markdown; charset=utf-8'), note, renderMarkdown);
  });

  // ---- Search ----

  app.get('/search', async (request) => {
    const query = searchQuery.parse(request.query);
    return tree.search({
      keyword: query.q,
      tags: query.tags,
      modifiedFrom: query.from,
      modifiedTo: query.to,
      scope: query.scope,
    });
  });

  // ---- Tags & labels ----

  app.get('/tags', async () => {
    return tree.getAllTags();
  });

  app.get('/tags/all', async () => {
    return tree.listTags();
  });

  app.post('/tags', async (request, reply) => {
    const { name } = tagBody.parse(request.body);
    return respond(reply, tree.createTag(name), (id) => ({ id }), 201);
  });

  app.delete<{ Params: { name: string } }>('/tags/:name', async (request, reply) => {
    return respond(reply, tree.deleteTag(request.params.name), done);
  });

  app.get('/labels', async () => {
    return tree.listColorLabels();
  });

  app.post('/labels', async (request, reply) => {
    const { name, color } = labelBody.parse(request.body);
    return respond(reply, tree.defineColorLabel(name, color), (label) => label, 201);
  });

  // ---- Trash ----

  app.get('/trash', async () => {
    return tree.getTrashContents();
  });

  app.post('/trash/restore', async (request, reply) => {
    const { id, type } = restoreBody.parse(request.body);
    return respond(reply, tree.restoreItem(id, type === 'note'), done);
  });

  app.delete('/trash', async (_request, reply) => {
    return respond(reply, tree.emptyTrash(), (stats) => stats);
  });

  // ---- Import ----

  app.post('/import', async (request, reply) => {
    const { filePath, folderId } = importBody.parse(request.body);
    return respond(reply, tree.importNoteFromText(filePath, folderId), (id) => ({ id }), 201);
  });
}
