import { z } from "zod";

const SupportedExchangeSchema = z.enum(["binance", "gate"]);
export type SupportedExchange = z.infer<typeof SupportedExchangeSchema>;

const PriceWalkDirectionSchema = z.enum(["up", "down", "sideways", "random"]);
export type PriceWalkDirection = z.infer<typeof PriceWalkDirectionSchema>;

export const VolumeProfileSchema = z.enum(["conservative", "moderate", "aggressive"]);
export type VolumeProfile = z.infer<typeof VolumeProfileSchema>;

const ExchangeSettingsSchema = z.object({
  exchange: SupportedExchangeSchema.default("binance"),
  baseAsset: z.string().min(1).default("ETH"),
  quoteAsset: z.string().min(1).default("USDT"),
  tradingPair: z.string().min(3).optional(),
  apiKey: z.string().min(1).optional(),
  apiSecret: z.string().min(1).optional(),
  sandbox: z.boolean().default(false)
});
export type ExchangeSettings = z.infer<typeof ExchangeSettingsSchema>;

export const StrategySettingsSchema = z
  .object({
    targetVolumeUsdtPerHour: z.number().positive().default(100),
    priceWalkDirection: PriceWalkDirectionSchema.default("sideways"),
    maxPriceDeviation: z.number().gt(0).max(0.1).default(0.01),
    orderFrequencySeconds: z.number().int().min(1).default(60),
    minOrderRatio: z.number().gt(0).max(1).default(0.001),
    maxOrderRatio: z.number().gt(0).max(1).default(0.005),
    sizeRandomization: z.number().min(0).max(1).default(0.3),
    timingRandomization: z.number().min(0).max(1).default(0.5),
    burstProbability: z.number().min(0).max(1).default(0.05),
    quietProbability: z.number().min(0).max(1).default(0.15),
    minOrderValueUsdt: z.number().positive().default(5),
    maxSpreadThreshold: z.number().gt(0).max(1).default(0.05),
    cancelPreviousOrders: z.boolean().default(true)
  })
  .superRefine((value, ctx) => {
    if (value.minOrderRatio >= value.maxOrderRatio) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Min order ratio must be less than max order ratio",
        path: ["minOrderRatio"]
      });
    }
  });
export type StrategySettings = z.infer<typeof StrategySettingsSchema>;

const RuntimeSettingsSchema = z.object({
  dryRun: z.boolean().default(true),
  autoStart: z.boolean().default(true),
  runDurationHours: z.number().positive().optional(),
  checkIntervalSeconds: z.number().min(1).default(5),
  cleanupIntervalSeconds: z.number().min(1).default(300),
  balanceWarningWaitSeconds: z.number().min(0).default(30),
  errorRetryWaitSeconds: z.number().min(0).default(30),
  maxBalanceUsageRatio: z.number().gt(0).max(1).default(0.1),
  port: z.number().int().min(1).max(65535).default(8148),
  apiKey: z.string().min(16).optional()
});

export const AppConfigSchema = z
  .object({
    exchange: ExchangeSettingsSchema,
    strategy: StrategySettingsSchema,
    runtime: RuntimeSettingsSchema
  })
  .superRefine((value, ctx) => {
    if (value.runtime.dryRun) return;
    if (!value.exchange.apiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "API key is required when dryRun=false",
        path: ["exchange", "apiKey"]
      });
    }
    if (!value.exchange.apiSecret) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "API secret is required when dryRun=false",
        path: ["exchange", "apiSecret"]
      });
    }
  });
export type AppConfig = z.infer<typeof AppConfigSchema>;

export function resolveTradingPair(exchange: Pick<ExchangeSettings, "baseAsset" | "quoteAsset" | "tradingPair">): string {
  const explicit = exchange.tradingPair?.trim();
  if (explicit) return explicit.toUpperCase();
  return `${exchange.baseAsset.trim().toUpperCase()}/${exchange.quoteAsset.trim().toUpperCase()}`;
}

const VOLUME_PRESETS: Record<VolumeProfile, Partial<StrategySettings>> = {
  // low market impact
  conservative: {
    targetVolumeUsdtPerHour: 50,
    priceWalkDirection: "sideways",
    maxPriceDeviation: 0.005,
    orderFrequencySeconds: 120,
    minOrderRatio: 0.001,
    maxOrderRatio: 0.003,
    timingRandomization: 0.8,
    burstProbability: 0.02,
    quietProbability: 0.2
  },
  moderate: {
    targetVolumeUsdtPerHour: 100,
    priceWalkDirection: "sideways",
    maxPriceDeviation: 0.01,
    orderFrequencySeconds: 60,
    minOrderRatio: 0.001,
    maxOrderRatio: 0.005,
    timingRandomization: 0.5,
    burstProbability: 0.05,
    quietProbability: 0.1
  },
  // high market impact
  aggressive: {
    targetVolumeUsdtPerHour: 200,
    priceWalkDirection: "random",
    maxPriceDeviation: 0.02,
    orderFrequencySeconds: 30,
    minOrderRatio: 0.002,
    maxOrderRatio: 0.008,
    timingRandomization: 0.3,
    burstProbability: 0.15,
    quietProbability: 0.05
  }
};

export function deriveStrategyPreset(profile: VolumeProfile): Partial<StrategySettings> {
  return { ...VOLUME_PRESETS[profile] };
}
