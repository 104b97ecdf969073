import { Global, Module } from "@nestjs/common";

import { createLogger, LOGGER } from "./pino-logger";

@Global()
@Module({
  providers: [{ provide: LOGGER, useFactory: () => createLogger() }],
  exports: [LOGGER]
})
export class LoggingModule {}
