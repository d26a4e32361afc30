import { z } from 'zod';
import { ValidationError } from '../errors';
import type { ItemFields, ItemId, ItemPatch } from '../types';

// ---------- Schemas ----------
const BODY_NOT_OBJECT = 'Request body must be a JSON object';

// numeric strings ("12.50") are accepted, anything else must already be a number
const priceSchema = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() !== '' && Number.isFinite(Number(v)) ? Number(v) : v),
  z
    .number({ required_error: 'price is required', invalid_type_error: 'price must be a number' })
    .finite('price must be a finite number')
    .nonnegative('price must be a non-negative number'),
);

const itemFieldsSchema = z.object(
  {
    name: z
      .string({ required_error: 'name is required', invalid_type_error: 'name must be a string' })
      .refine((s) => s.trim().length > 0, 'name must not be empty'),
    description: z.string({ invalid_type_error: 'description must be a string' }).optional(),
    price: priceSchema,
    metadata: z.record(z.unknown(), { invalid_type_error: 'metadata must be an object' }).optional(),
  },
  { required_error: BODY_NOT_OBJECT, invalid_type_error: BODY_NOT_OBJECT },
);

const itemPatchSchema = itemFieldsSchema.partial();

const loginSchema = z.object(
  {
    username: z.string({ required_error: 'username is required', invalid_type_error: 'username must be a string' }),
    password: z.string({ required_error: 'password is required', invalid_type_error: 'password must be a string' }),
  },
  { required_error: BODY_NOT_OBJECT, invalid_type_error: BODY_NOT_OBJECT },
);

const itemParamsSchema = z.object({
  id: z
    .string()
    .regex(/^[1-9][0-9]*$/)
    .transform(Number)
    .refine(Number.isSafeInteger),
});

export type LoginBody = z.infer<typeof loginSchema>;

// ---------- Parsing ----------
export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ValidationError };

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): ParseResult<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) return { ok: true, value: parsed.data };
  const message = parsed.error.issues.map((issue) => issue.message).join('; ');
  return { ok: false, error: new ValidationError(message) };
}

export function parseItemFields(input: unknown): ParseResult<ItemFields> {
  return parseWith(itemFieldsSchema, input);
}

export function parseItemPatch(input: unknown): ParseResult<ItemPatch> {
  return parseWith(itemPatchSchema, input);
}

export function parseLoginBody(input: unknown): ParseResult<LoginBody> {
  return parseWith(loginSchema, input);
}

/** Reads `{id}` from route params; a non-numeric or missing id is a 400, never a 404. */
export function parseItemId(params: unknown): ItemId {
  const parsed = itemParamsSchema.safeParse(params);
  if (!parsed.success) {
    throw new ValidationError('Item id must be a positive integer', 'invalid_item_id');
  }
  return parsed.data.id;
}
