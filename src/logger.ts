// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import { pino, type DestinationStream, type Logger } from "pino";

export type { Logger };

/**
 * JSON lines with the level as a label. The server logs to stdout; the CLI
 * passes stderr so its own output stays clean.
 */
export function createLogger(
  level: string = process.env.LOG_LEVEL || "info",
  destination?: DestinationStream
): Logger {
  const options = {
    level,
    formatters: {
      level: (label: string) => ({ level: label })
    }
  };
  return destination ? pino(options, destination) : pino(options);
}

export const silentLogger: Logger = pino({ level: "silent" });
