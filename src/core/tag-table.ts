import { DuplicateNameError, InvalidNameError, NotFoundError } from '../errors.js';
import type { ColorLabel, Tag, TagId } from '../types/index.js';
import type { IdAllocator } from './id-allocator.js';
import { err, ok, type Result } from './result.js';

const HEX_COLOR = /^#[0-9A-Fa-f]{6}$/;

function validateTagName(name: string): Result<string> {
  const trimmed = name.trim();
  if (!trimmed) {
    return err(new InvalidNameError(name, 'tag name must not be empty'));
  }
  if (/[,\n]/.test(trimmed)) {
    return err(new InvalidNameError(name, 'tag name must not contain commas or line breaks'));
  }
  return ok(trimmed);
}

/**
 * Owns every Tag once; notes refer to tags by id.
 */
export class TagTable {
  private byId = new Map<TagId, Tag>();
  private byName = new Map<string, TagId>();
  private changes = 0;

  constructor(private readonly allocator: IdAllocator) {}

  /**
   * Bumped on every insert or removal.
   */
  get revision(): number {
    return this.changes;
  }

  /**
   * Find a tag by name, creating it when missing.
   */
  resolve(name: string): Result<Tag> {
    const validated = validateTagName(name);
    if (!validated.ok) return validated;

    const existing = this.findByName(validated.value);
    if (existing) return ok(existing);
    return ok(this.insert(validated.value));
  }

  create(name: string): Result<Tag> {
    const validated = validateTagName(name);
    if (!validated.ok) return validated;
    if (this.byName.has(validated.value)) {
      return err(new DuplicateNameError('Tag', validated.value));
    }
    return ok(this.insert(validated.value));
  }

  /**
   * Re-insert a persisted tag under its original id.
   */
  restore(tag: Tag): Result<Tag> {
    const validated = validateTagName(tag.name);
    if (!validated.ok) return validated;
    if (this.byName.has(validated.value) || this.byId.has(tag.id)) {
      return err(new DuplicateNameError('Tag', validated.value));
    }
    this.allocator.observe('tag', tag.id);
    return ok(this.insert(validated.value, tag.id));
  }

  remove(name: string): Result<Tag> {
    const tag = this.findByName(name.trim());
    if (!tag) {
      return err(new NotFoundError('Tag', name));
    }
    this.byId.delete(tag.id);
    this.byName.delete(tag.name);
    this.changes += 1;
    return ok(tag);
  }

  findByName(name: string): Tag | undefined {
    const id = this.byName.get(name);
    return id === undefined ? undefined : this.byId.get(id);
  }

  get(id: TagId): Tag | undefined {
    return this.byId.get(id);
  }

  /**
   * Names for a set of tag ids, in tag id order.
   */
  namesOf(ids: Iterable<TagId>): string[] {
    return Array.from(ids)
      .sort((a, b) => a - b)
      .map((id) => this.byId.get(id)?.name)
      .filter((name): name is string => name !== undefined);
  }

  list(): Tag[] {
    return Array.from(this.byId.values()).sort((a, b) => a.id - b.id);
  }

  private insert(name: string, id: TagId = this.allocator.nextId('tag')): Tag {
    const tag: Tag = { id, name };
    this.byId.set(tag.id, tag);
    this.byName.set(name, tag.id);
    this.changes += 1;
    return tag;
  }
}

/**
 * Named color labels shared by reference between notes.
 */
export class ColorLabelRegistry {
  private labels = new Map<string, ColorLabel>();
  private changes = 0;

  get revision(): number {
    return this.changes;
  }

  define(name: string, color: string): Result<ColorLabel> {
    const trimmed = name.trim();
    if (!trimmed) {
      return err(new InvalidNameError(name, 'label name must not be empty'));
    }
    if (!HEX_COLOR.test(color)) {
      return err(new InvalidNameError(color, 'color must be a #RRGGBB hex code'));
    }
    const label: ColorLabel = { name: trimmed, color: color.toUpperCase() };
    this.labels.set(trimmed, label);
    this.changes += 1;
    return ok(label);
  }

  get(name: string): ColorLabel | undefined {
    return this.labels.get(name);
  }

  list(): ColorLabel[] {
    return Array.from(this.labels.values());
  }
}
