import { Inject, Injectable } from "@nestjs/common";

import { ConfigService } from "../config/config.service";
import { EXCHANGE_CLIENT, type ExchangeClient } from "./exchange-client";
import { errorMessage, sanitizeExchangeErrorMessage } from "./exchange-errors";

const STATUS_CACHE_TTL_MS = 30_000;

export type ExchangeStatus = {
  checkedAt: string;
  exchange: string;
  pair: string;
  sandbox: boolean;
  dryRun: boolean;
  configured: boolean;
  reachable: boolean;
  authenticated: boolean;
  error?: string;
};

@Injectable()
export class ExchangeStatusService {
  private cached: ExchangeStatus | null = null;
  private cachedAtMs = 0;

  constructor(
    private readonly configService: ConfigService,
    @Inject(EXCHANGE_CLIENT) private readonly exchange: ExchangeClient
  ) {}

  async getStatus(): Promise<ExchangeStatus> {
    const now = Date.now();
    if (this.cached && now - this.cachedAtMs < STATUS_CACHE_TTL_MS) {
      return this.cached;
    }

    const config = this.configService.load();
    const status: ExchangeStatus = {
      checkedAt: new Date(now).toISOString(),
      exchange: this.exchange.id,
      pair: this.configService.tradingPair,
      sandbox: config.exchange.sandbox,
      dryRun: config.runtime.dryRun,
      configured: Boolean(config.exchange.apiKey && config.exchange.apiSecret),
      reachable: false,
      authenticated: false
    };

    try {
      await this.exchange.ping();
      status.reachable = true;
    } catch (err) {
      status.error = sanitizeExchangeErrorMessage(errorMessage(err));
    }

    if (status.reachable && status.configured) {
      try {
        await this.exchange.fetchBalance(config.exchange.quoteAsset);
        status.authenticated = true;
      } catch (err) {
        status.error = sanitizeExchangeErrorMessage(errorMessage(err));
      }
    }

    this.cachedAtMs = now;
    this.cached = status;
    return status;
  }
}
