import { z } from "zod";

import type { RecordInput } from "../core/types.js";

// invalid fields parse as absent; only a non-object item fails the page
const IdSchema = z
  .union([z.string().min(1), z.number().finite()])
  .transform(String)
  .optional()
  .catch(undefined);

const TextSchema = z
  .union([z.string(), z.number().finite()])
  .transform(String)
  .optional()
  .catch(undefined);

/** One upstream message. Unknown fields are ignored; only a non-object item is rejected. */
export const UpstreamMessageSchema = z.object({
  id: IdSchema,
  _id: IdSchema,
  user_id: IdSchema,
  user_name: TextSchema,
  timestamp: TextSchema,
  message: TextSchema,
});

export type UpstreamMessage = z.infer<typeof UpstreamMessageSchema>;

export const UpstreamMessageListSchema = z.array(UpstreamMessageSchema);

const TotalSchema = z
  .union([z.number(), z.string()])
  .pipe(z.coerce.number().int().nonnegative())
  .optional()
  .catch(undefined);

const LIST_KEYS = ["items", "messages", "data", "results"] as const;

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export interface UpstreamPage {
  items: unknown[];
  total?: number;
}

/**
 * Normalizes the response shapes the messages endpoint has been seen to return:
 * a bare array, `{ items | messages | data | results, total? }`, or an
 * id -> message mapping. Returns undefined for anything else.
 */
export function normalizePage(body: unknown): UpstreamPage | undefined {
  if (Array.isArray(body)) return { items: body };
  if (!isObject(body)) return undefined;

  for (const key of LIST_KEYS) {
    const list = body[key];
    if (Array.isArray(list)) return { items: list, total: TotalSchema.parse(body.total) };
  }

  const values = Object.values(body);
  if (values.every(isObject)) {
    return { items: values };
  }
  return undefined;
}

export function toRecordInput(msg: UpstreamMessage): RecordInput {
  const record: RecordInput = { text: msg.message ?? "" };
  const id = msg.id ?? msg._id;
  if (id !== undefined) record.id = id;

  const metadata: NonNullable<RecordInput["metadata"]> = {};
  if (msg.timestamp !== undefined) metadata.timestamp = msg.timestamp;
  if (msg.user_name !== undefined) metadata.author = msg.user_name;
  if (msg.user_id !== undefined) metadata.authorId = msg.user_id;
  if (Object.keys(metadata).length) record.metadata = metadata;

  return record;
}
