import { z } from "zod";

const BotPhaseSchema = z.enum(["STOPPED", "TRADING", "STOPPING"]);

const DecisionKindSchema = z.enum(["ENGINE", "TRADE", "SKIP", "ERROR", "CLEANUP"]);
export type DecisionKind = z.infer<typeof DecisionKindSchema>;

const DecisionSchema = z.object({
  id: z.string().min(1),
  ts: z.string().min(1),
  kind: DecisionKindSchema,
  summary: z.string().min(1),
  details: z.record(z.unknown()).optional()
});
export type Decision = z.infer<typeof DecisionSchema>;

const OrderSideSchema = z.enum(["buy", "sell"]);
export type OrderSide = z.infer<typeof OrderSideSchema>;

const OrderStatusSchema = z.enum(["open", "filled", "canceled", "not_found"]);
export type OrderStatus = z.infer<typeof OrderStatusSchema>;

const OrderRecordSchema = z.object({
  // Empty when the exchange acknowledged the order without an id; such orders are not tracked.
  id: z.string(),
  pair: z.string().min(1),
  side: OrderSideSchema,
  amount: z.number().positive(),
  price: z.number().positive().optional(),
  status: OrderStatusSchema,
  dryRun: z.boolean()
});
export type OrderRecord = z.infer<typeof OrderRecordSchema>;

const BotStateSchema = z.object({
  running: z.boolean(),
  phase: BotPhaseSchema,
  startedAt: z.string().min(1).optional(),
  endsAt: z.string().min(1).optional(),
  pausedUntil: z.string().min(1).optional(),
  lastError: z.string().optional()
});
export type BotState = z.infer<typeof BotStateSchema>;

export function defaultBotState(): BotState {
  return {
    running: false,
    phase: "STOPPED"
  };
}
