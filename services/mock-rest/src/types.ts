export type ItemId = number;
export type UserId = string;

export type ItemMetadata = Record<string, unknown>;

export interface Item {
  id: ItemId;          // assigned by the store, never reused
  name: string;
  description?: string;
  price: number;
  metadata?: ItemMetadata;
  created_at: number;
  updated_at: number;
}

// Client-controlled fields of an item after validation
export interface ItemFields {
  name: string;
  description?: string;
  price: number;
  metadata?: ItemMetadata;
}

export type ItemPatch = Partial<ItemFields>;

export interface SessionToken {
  token: string;
  user_id: UserId;
  issued_at: number;
}

export interface Principal {
  userId: UserId;
  token: string;
}
