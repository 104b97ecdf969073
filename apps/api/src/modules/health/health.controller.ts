import { Controller, Get } from "@nestjs/common";

@Controller("health")
export class HealthController {
  @Get()
  getHealth(): { ok: true; ts: string; uptimeSeconds: number } {
    return { ok: true, ts: new Date().toISOString(), uptimeSeconds: Math.round(process.uptime()) };
  }
}
