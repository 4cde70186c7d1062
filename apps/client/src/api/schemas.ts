import { z } from "zod";

export const envelopeSchema = z.object({
  code: z.number().int(),
  message: z.string().nullish(),
  data: z.unknown().optional()
});

export type Envelope = z.infer<typeof envelopeSchema>;

export const voidSchema = z.unknown().transform((): void => undefined);

export const chargingStateSchema = z.enum([
  "NOTCHARGING",
  "WAITINGSTAGE1",
  "WAITINGSTAGE2",
  "CHARGING",
  "CHANGEMODEREQUEUE",
  "FAULTREQUEUE"
]);

export const loginSchema = z
  .object({
    token: z.string().min(1),
    is_admin: z.boolean()
  })
  .transform((v) => ({ token: v.token, isAdmin: v.is_admin }));

export const serverTimeSchema = z.object({
  datetime: z.string(),
  timestamp: z.number()
});

export const previewQueueSchema = z
  .object({
    cur_state: chargingStateSchema,
    queue_len: z.number().int().nullish(),
    charge_id: z.string().nullish()
  })
  .transform((v) => ({
    state: v.cur_state,
    queueLength: v.queue_len === undefined || v.queue_len === null || v.queue_len < 0 ? null : v.queue_len,
    chargeRequestId: v.charge_id ? v.charge_id : null
  }));

const cellSchema = z.union([z.string(), z.number(), z.boolean()]).nullish();

export const billSchema = z
  .object({
    bill_id: cellSchema,
    create_time: cellSchema,
    pile_id: cellSchema,
    charged_amount: cellSchema,
    charged_time: cellSchema,
    begin_time: cellSchema,
    end_time: cellSchema,
    charging_cost: cellSchema,
    service_cost: cellSchema,
    total_cost: cellSchema
  })
  .passthrough();

export const billListSchema = z.array(billSchema).nullish().transform((v) => v ?? []);

export const orderDetailSchema = z.record(z.string(), cellSchema);

export const orderDetailListSchema = z.array(orderDetailSchema).nullish().transform((v) => v ?? []);

export const adminRecordSchema = z.record(z.string(), z.unknown());

export const adminRecordListSchema = z.array(adminRecordSchema).nullish().transform((v) => v ?? []);
