import "reflect-metadata";

import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { json } from "express";
import type { Logger } from "pino";
import pinoHttp from "pino-http";

import { AppModule } from "./modules/app.module";
import { ConfigService, ConfigValidationError } from "./modules/config/config.service";
import { LOGGER } from "./modules/logging/pino-logger";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: false
  });
  const logger = app.get<symbol, Logger>(LOGGER);

  app.use(json({ limit: "100kb" }));
  app.use(pinoHttp({ logger }));

  app.useLogger({
    log: (message) => logger.info({ msg: message }),
    error: (message, trace) => logger.error({ msg: message, trace }),
    warn: (message) => logger.warn({ msg: message }),
    debug: (message) => logger.debug({ msg: message }),
    verbose: (message) => logger.trace({ msg: message })
  });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  for (const warning of configService.warnings()) {
    logger.warn({ msg: warning });
  }

  const { port } = configService.load().runtime;
  await app.listen(port, "0.0.0.0");

  logger.info({ msg: "API listening", port, pair: configService.tradingPair });
}

bootstrap().catch((err) => {
  if (err instanceof ConfigValidationError) {
    console.error(err.message);
  } else {
    console.error(err);
  }
  process.exit(1);
});
