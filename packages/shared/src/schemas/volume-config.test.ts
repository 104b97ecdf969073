import { describe, expect, it } from "vitest";

import {
  AppConfigSchema,
  deriveStrategyPreset,
  resolveTradingPair,
  StrategySettingsSchema
} from "./volume-config";

describe("StrategySettingsSchema", () => {
  it("fills the documented defaults", () => {
    const settings = StrategySettingsSchema.parse({});
    expect(settings).toEqual({
      targetVolumeUsdtPerHour: 100,
      priceWalkDirection: "sideways",
      maxPriceDeviation: 0.01,
      orderFrequencySeconds: 60,
      minOrderRatio: 0.001,
      maxOrderRatio: 0.005,
      sizeRandomization: 0.3,
      timingRandomization: 0.5,
      burstProbability: 0.05,
      quietProbability: 0.15,
      minOrderValueUsdt: 5,
      maxSpreadThreshold: 0.05,
      cancelPreviousOrders: true
    });
  });

  it("rejects a min order ratio that is not below the max", () => {
    const result = StrategySettingsSchema.safeParse({ minOrderRatio: 0.005, maxOrderRatio: 0.005 });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.message).toBe("Min order ratio must be less than max order ratio");
    expect(result.error.issues[0]?.path).toEqual(["minOrderRatio"]);
  });

  it("bounds the max price deviation to (0, 0.1]", () => {
    expect(StrategySettingsSchema.safeParse({ maxPriceDeviation: 0 }).success).toBe(false);
    expect(StrategySettingsSchema.safeParse({ maxPriceDeviation: 0.1 }).success).toBe(true);
    expect(StrategySettingsSchema.safeParse({ maxPriceDeviation: 0.11 }).success).toBe(false);
  });

  it("requires a whole number of seconds between orders", () => {
    expect(StrategySettingsSchema.safeParse({ orderFrequencySeconds: 0 }).success).toBe(false);
    expect(StrategySettingsSchema.safeParse({ orderFrequencySeconds: 1.5 }).success).toBe(false);
  });
});

describe("AppConfigSchema", () => {
  it("allows missing credentials in dry-run mode", () => {
    const result = AppConfigSchema.safeParse({ exchange: {}, strategy: {}, runtime: { dryRun: true } });
    expect(result.success).toBe(true);
  });

  it("requires credentials for live trading", () => {
    const result = AppConfigSchema.safeParse({ exchange: {}, strategy: {}, runtime: { dryRun: false } });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((i) => i.path.join("."))).toEqual(["exchange.apiKey", "exchange.apiSecret"]);
  });
});

describe("resolveTradingPair", () => {
  it("joins base and quote assets when no pair is given", () => {
    expect(resolveTradingPair({ baseAsset: "eth", quoteAsset: "usdt" })).toBe("ETH/USDT");
  });

  it("prefers an explicit trading pair", () => {
    expect(resolveTradingPair({ baseAsset: "ETH", quoteAsset: "USDT", tradingPair: "btc/usdc" })).toBe("BTC/USDC");
  });
});

describe("deriveStrategyPreset", () => {
  it("produces settings that pass validation", () => {
    const aggressive = StrategySettingsSchema.parse(deriveStrategyPreset("aggressive"));
    expect(aggressive.priceWalkDirection).toBe("random");
    expect(aggressive.orderFrequencySeconds).toBe(30);
    expect(aggressive.minOrderValueUsdt).toBe(5);
  });

  it("returns a fresh object on every call", () => {
    const first = deriveStrategyPreset("conservative");
    first.targetVolumeUsdtPerHour = 1;
    expect(deriveStrategyPreset("conservative").targetVolumeUsdtPerHour).toBe(50);
  });
});
