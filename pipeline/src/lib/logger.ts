import { destination, pino, type DestinationStream, type Logger } from "pino";

import { env } from "../config/env.js";

export type { Logger };

/** stderr, so stdout carries only the CLI's summary lines. */
export const createLogDestination = () =>
  destination({ dest: 2, sync: true });

export const createLogger = (
  level: string = env.LOG_LEVEL,
  destination: DestinationStream = createLogDestination(),
): Logger =>
  pino(
    {
      name: "prepare-dataset",
      level,
      base: undefined,
    },
    destination,
  );

export const logger = createLogger();
