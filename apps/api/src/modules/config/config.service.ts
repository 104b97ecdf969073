import fs from "node:fs";
import path from "node:path";

import { Injectable } from "@nestjs/common";
import type { AppConfig } from "@volume-bot/shared";
import { AppConfigSchema, deriveStrategyPreset, resolveTradingPair, VolumeProfileSchema } from "@volume-bot/shared";

type Env = Record<string, string | undefined>;
type Section = Record<string, unknown>;

const PLACEHOLDER_API_KEY = "your_api_key_here";
const PLACEHOLDER_API_SECRET = "your_api_secret_here";

export class ConfigValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigValidationError";
  }
}

type EnvKind = "string" | "number" | "boolean";

const EXCHANGE_ENV: Record<string, [key: string, kind: EnvKind]> = {
  EXCHANGE: ["exchange", "string"],
  BASE_ASSET: ["baseAsset", "string"],
  QUOTE_ASSET: ["quoteAsset", "string"],
  TRADING_PAIR: ["tradingPair", "string"],
  EXCHANGE_API_KEY: ["apiKey", "string"],
  EXCHANGE_API_SECRET: ["apiSecret", "string"],
  SANDBOX_MODE: ["sandbox", "boolean"]
};

const STRATEGY_ENV: Record<string, [key: string, kind: EnvKind]> = {
  TARGET_VOLUME_USDT_PER_HOUR: ["targetVolumeUsdtPerHour", "number"],
  PRICE_WALK_DIRECTION: ["priceWalkDirection", "string"],
  MAX_PRICE_DEVIATION: ["maxPriceDeviation", "number"],
  ORDER_FREQUENCY: ["orderFrequencySeconds", "number"],
  MIN_ORDER_RATIO: ["minOrderRatio", "number"],
  MAX_ORDER_RATIO: ["maxOrderRatio", "number"],
  SIZE_RANDOMIZATION: ["sizeRandomization", "number"],
  TIMING_RANDOMIZATION: ["timingRandomization", "number"],
  BURST_PROBABILITY: ["burstProbability", "number"],
  QUIET_PROBABILITY: ["quietProbability", "number"],
  MIN_ORDER_VALUE_USDT: ["minOrderValueUsdt", "number"],
  MAX_SPREAD_THRESHOLD: ["maxSpreadThreshold", "number"],
  CANCEL_PREVIOUS_ORDERS: ["cancelPreviousOrders", "boolean"]
};

const RUNTIME_ENV: Record<string, [key: string, kind: EnvKind]> = {
  DRY_RUN: ["dryRun", "boolean"],
  AUTO_START: ["autoStart", "boolean"],
  RUN_DURATION_HOURS: ["runDurationHours", "number"],
  CHECK_INTERVAL_SECONDS: ["checkIntervalSeconds", "number"],
  CLEANUP_INTERVAL_SECONDS: ["cleanupIntervalSeconds", "number"],
  BALANCE_WARNING_WAIT_SECONDS: ["balanceWarningWaitSeconds", "number"],
  ERROR_RETRY_WAIT_SECONDS: ["errorRetryWaitSeconds", "number"],
  MAX_BALANCE_USAGE_RATIO: ["maxBalanceUsageRatio", "number"],
  PORT: ["port", "number"],
  API_KEY: ["apiKey", "string"]
};

// Unparseable values pass through as strings so the schema reports them with their path.
function coerceEnvValue(raw: string, kind: EnvKind): unknown {
  const value = raw.trim();
  if (kind === "number") {
    const n = Number(value);
    return value !== "" && Number.isFinite(n) ? n : value;
  }
  if (kind === "boolean") {
    const lowered = value.toLowerCase();
    if (["true", "1", "yes", "on"].includes(lowered)) return true;
    if (["false", "0", "no", "off"].includes(lowered)) return false;
    return value;
  }
  return value;
}

function readEnvSection(env: Env, mapping: Record<string, [key: string, kind: EnvKind]>): Section {
  const out: Section = {};
  for (const [name, [key, kind]] of Object.entries(mapping)) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") continue;
    out[key] = coerceEnvValue(raw, kind);
  }
  return out;
}

function asSection(v: unknown): Section {
  if (!v || typeof v !== "object" || Array.isArray(v)) return {};
  return Object.fromEntries(Object.entries(v));
}

/**
 * Builds the validated config: schema defaults, then the `VOLUME_PROFILE` preset,
 * then `config.json`, then environment variables.
 */
export function parseAppConfig(env: Env, fileConfig?: unknown): AppConfig {
  const file = asSection(fileConfig);
  const issues: string[] = [];

  let preset: Section = {};
  const profileRaw = env.VOLUME_PROFILE?.trim();
  if (profileRaw) {
    const profile = VolumeProfileSchema.safeParse(profileRaw.toLowerCase());
    if (profile.success) {
      preset = deriveStrategyPreset(profile.data);
    } else {
      issues.push(`volumeProfile: ${profile.error.issues[0]?.message ?? "Invalid volume profile"}`);
    }
  }

  const merged = {
    exchange: { ...asSection(file.exchange), ...readEnvSection(env, EXCHANGE_ENV) },
    strategy: { ...preset, ...asSection(file.strategy), ...readEnvSection(env, STRATEGY_ENV) },
    runtime: { ...asSection(file.runtime), ...readEnvSection(env, RUNTIME_ENV) }
  };

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    issues.push(...parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  if (issues.length > 0 || !parsed.success) {
    throw new ConfigValidationError(issues);
  }
  return parsed.data;
}

export function collectConfigWarnings(config: AppConfig): string[] {
  const warnings: string[] = [];
  const { apiKey, apiSecret } = config.exchange;

  if (!apiKey || !apiSecret) {
    warnings.push("Exchange API credentials are not set; only dry-run trading is possible.");
  }
  if (apiKey === PLACEHOLDER_API_KEY) {
    warnings.push("EXCHANGE_API_KEY still holds the placeholder value.");
  }
  if (apiSecret === PLACEHOLDER_API_SECRET) {
    warnings.push("EXCHANGE_API_SECRET still holds the placeholder value.");
  }
  if (!config.runtime.dryRun) {
    warnings.push("Live trading is enabled: orders will be sent to the exchange.");
  }
  return warnings;
}

@Injectable()
export class ConfigService {
  private cachedConfig: AppConfig | null = null;

  get dataDir(): string {
    return process.env.DATA_DIR ?? path.resolve(process.cwd(), "../../data");
  }

  private get configPath(): string {
    return path.join(this.dataDir, "config.json");
  }

  private readConfigFile(): unknown {
    if (!fs.existsSync(this.configPath)) return undefined;
    try {
      return JSON.parse(fs.readFileSync(this.configPath, "utf-8"));
    } catch (err) {
      throw new ConfigValidationError([`config.json: ${err instanceof Error ? err.message : String(err)}`]);
    }
  }

  load(): AppConfig {
    if (this.cachedConfig) return this.cachedConfig;
    this.cachedConfig = parseAppConfig(process.env, this.readConfigFile());
    return this.cachedConfig;
  }

  get tradingPair(): string {
    return resolveTradingPair(this.load().exchange);
  }

  warnings(): string[] {
    return collectConfigWarnings(this.load());
  }
}
