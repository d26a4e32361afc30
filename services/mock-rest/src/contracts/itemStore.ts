import type { Item, ItemId } from '../types';

/**
 * Keyed collection of items that the item routes rely on.
 *
 * Implementations validate raw client payloads themselves, so a failed
 * validation never leaves a partially applied change behind. Failures are
 * reported by throwing `ValidationError` or `NotFoundError`.
 */
export interface ItemStore {
  /** Validates `fields`, assigns the next unused id and stores the item. */
  create(fields: unknown): Promise<Item>;
  get(id: ItemId): Promise<Item>;
  /** All current items in creation order. */
  list(): Promise<Item[]>;
  /** Overwrites every client field; omitted optional fields are cleared. */
  replace(id: ItemId, fields: unknown): Promise<Item>;
  /** Overwrites only the fields present in `partialFields`. */
  patch(id: ItemId, partialFields: unknown): Promise<Item>;
  delete(id: ItemId): Promise<void>;
  count(): Promise<number>;
}
