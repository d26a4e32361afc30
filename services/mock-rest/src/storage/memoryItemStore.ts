import { NotFoundError } from '../errors';
import { parseItemFields, parseItemPatch } from '../schemas/payloads';
import type { ItemStore } from '../contracts/itemStore';
import type { Item, ItemFields, ItemId } from '../types';

/**
 * Implements `ItemStore` on a Map, which keeps creation order for `list()`.
 *
 * Each operation runs lookup, validation and mutation synchronously with no
 * `await` in between, so on the event loop every call is atomic with respect
 * to every other call, id assignment included.
 */
export class MemoryItemStore implements ItemStore {
  private readonly items = new Map<ItemId, Item>();
  private lastId = 0;

  constructor(private readonly now: () => number = Date.now) {}

  async create(fields: unknown): Promise<Item> {
    const parsed = parseItemFields(fields);
    if (!parsed.ok) throw parsed.error;

    const ts = this.now();
    const item = compose(++this.lastId, parsed.value, ts, ts);
    this.items.set(item.id, item);
    return structuredClone(item);
  }

  async get(id: ItemId): Promise<Item> {
    return structuredClone(this.require(id));
  }

  async list(): Promise<Item[]> {
    return Array.from(this.items.values(), (item) => structuredClone(item));
  }

  async replace(id: ItemId, fields: unknown): Promise<Item> {
    const current = this.require(id);
    const parsed = parseItemFields(fields);
    if (!parsed.ok) throw parsed.error;

    const item = compose(id, parsed.value, current.created_at, this.updatedAt(current));
    this.items.set(id, item);
    return structuredClone(item);
  }

  async patch(id: ItemId, partialFields: unknown): Promise<Item> {
    const current = this.require(id);
    const parsed = parseItemPatch(partialFields);
    if (!parsed.ok) throw parsed.error;

    const patch = parsed.value;
    const merged: ItemFields = {
      name: patch.name ?? current.name,
      description: patch.description ?? current.description,
      price: patch.price ?? current.price,
      metadata: patch.metadata ?? current.metadata,
    };
    const item = compose(id, merged, current.created_at, this.updatedAt(current));
    this.items.set(id, item);
    return structuredClone(item);
  }

  async delete(id: ItemId): Promise<void> {
    if (!this.items.delete(id)) throw notFound(id);
  }

  async count(): Promise<number> {
    return this.items.size;
  }

  private require(id: ItemId): Item {
    const item = this.items.get(id);
    if (!item) throw notFound(id);
    return item;
  }

  // keep updated_at strictly increasing even when the clock has not moved
  private updatedAt(current: Item): number {
    const now = this.now();
    return now > current.updated_at ? now : current.updated_at + 1;
  }
}

function compose(id: ItemId, fields: ItemFields, created_at: number, updated_at: number): Item {
  return {
    id,
    name: fields.name,
    ...(fields.description !== undefined ? { description: fields.description } : {}),
    price: fields.price,
    ...(fields.metadata !== undefined ? { metadata: fields.metadata } : {}),
    created_at,
    updated_at,
  };
}

function notFound(id: ItemId) {
  return new NotFoundError(`Item ${id} not found`);
}
