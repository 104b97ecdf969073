import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { ConfigService } from "../config/config.service";
import { CcxtExchangeAdapter, createCcxtExchange } from "./ccxt-exchange-adapter";
import { EXCHANGE_CLIENT, type ExchangeClient } from "./exchange-client";
import { ExchangeStatusService } from "./exchange-status.service";
import { IntegrationsController } from "./integrations.controller";
import { MarketDataService } from "./market-data.service";

@Module({
  imports: [ConfigModule],
  controllers: [IntegrationsController],
  providers: [
    {
      provide: EXCHANGE_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): ExchangeClient => {
        const { exchange } = configService.load();
        return new CcxtExchangeAdapter(
          createCcxtExchange({
            exchange: exchange.exchange,
            apiKey: exchange.apiKey,
            apiSecret: exchange.apiSecret,
            sandbox: exchange.sandbox
          }),
          exchange.exchange
        );
      }
    },
    ExchangeStatusService,
    MarketDataService
  ],
  exports: [EXCHANGE_CLIENT, MarketDataService]
})
export class IntegrationsModule {}
