import { Controller, Get } from "@nestjs/common";

import { type ExchangeStatus, ExchangeStatusService } from "./exchange-status.service";

@Controller("integrations")
export class IntegrationsController {
  constructor(private readonly exchangeStatus: ExchangeStatusService) {}

  @Get("exchange/status")
  async getExchangeStatus(): Promise<ExchangeStatus> {
    return await this.exchangeStatus.getStatus();
  }
}
