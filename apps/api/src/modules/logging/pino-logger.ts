import fs from "node:fs";
import path from "node:path";

import pino from "pino";

export const LOGGER = Symbol("LOGGER");

type Env = Record<string, string | undefined>;

export function resolveLogDir(env: Env = process.env): string {
  const dataDir = env.DATA_DIR ?? path.resolve(process.cwd(), "../../data");
  return env.LOG_DIR ?? path.join(dataDir, "logs");
}

/** JSON lines to stdout and to `api.log` under the log directory. */
export function createLogger(env: Env = process.env): pino.Logger {
  const logDir = resolveLogDir(env);
  fs.mkdirSync(logDir, { recursive: true });

  const destination = pino.destination({
    dest: path.join(logDir, "api.log"),
    sync: false
  });

  return pino(
    {
      level: env.LOG_LEVEL ?? "info",
      base: { service: "volume-bot" }
    },
    pino.multistream([{ stream: process.stdout }, { stream: destination }])
  );
}
