import { Module } from "@nestjs/common";

import { BotModule } from "./bot/bot.module";
import { ConfigModule } from "./config/config.module";
import { HealthModule } from "./health/health.module";
import { IntegrationsModule } from "./integrations/integrations.module";
import { LoggingModule } from "./logging/logging.module";

@Module({
  imports: [LoggingModule, ConfigModule, HealthModule, IntegrationsModule, BotModule]
})
export class AppModule {}
