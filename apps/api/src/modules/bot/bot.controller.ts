import { BadRequestException, Body, Controller, Get, Post } from "@nestjs/common";
import type { BotState, Decision } from "@volume-bot/shared";
import { z } from "zod";

import { BotEngineService, type BotRunStatsResponse } from "./bot-engine.service";

const StartRequestSchema = z
  .object({
    durationHours: z.number().positive().optional()
  })
  .optional();

@Controller()
export class BotController {
  constructor(private readonly botEngine: BotEngineService) {}

  @Get("bot/status")
  getStatus(): BotState {
    return this.botEngine.getState();
  }

  @Get("bot/run-stats")
  getRunStats(): BotRunStatsResponse {
    return this.botEngine.getRunStats();
  }

  @Get("bot/decisions")
  getDecisions(): Decision[] {
    return this.botEngine.getDecisions();
  }

  @Post("bot/start")
  start(@Body() body: unknown): { ok: true } {
    const parsed = StartRequestSchema.safeParse(body ?? undefined);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
    }
    this.botEngine.start({ durationHours: parsed.data?.durationHours });
    return { ok: true };
  }

  @Post("bot/stop")
  async stop(): Promise<{ ok: true }> {
    await this.botEngine.stop();
    return { ok: true };
  }

  @Get("orders/open")
  getOpenOrders(): { count: number; ids: string[] } {
    const ids = this.botEngine.openOrderIds();
    return { count: ids.length, ids };
  }

  @Post("orders/cancel-all")
  async cancelAll(): Promise<{ cancelled: number }> {
    return { cancelled: await this.botEngine.cancelAllOpen() };
  }

  @Post("orders/reconcile")
  async reconcile(): Promise<{ removed: number }> {
    return { removed: await this.botEngine.reconcileOpen() };
  }
}
