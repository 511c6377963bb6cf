import { z } from 'zod';

export const changedColumnSchema = z
  .object({
    columnTitle: z.string(),
    newValue: z.union([z.string(), z.boolean(), z.number(), z.null()]).optional(),
  })
  .passthrough();

export const webhookEventSchema = z
  .object({
    rowId: z.number().int().optional(),
    changedColumns: z.array(z.unknown()).optional(),
  })
  .passthrough();

export const webhookPayloadSchema = z
  .object({
    events: z.array(z.unknown()),
  })
  .passthrough();

export const challengeBodySchema = z
  .object({
    challenge: z.string().min(1),
    webhookId: z.number().optional(),
  })
  .passthrough();

export type ChangedColumn = z.infer<typeof changedColumnSchema>;

export interface WebhookEvent {
  rowId?: number;
  changedColumns: ChangedColumn[];
}

export interface WebhookReply {
  statusCode: number;
  body: { message: string };
}
