import Pino from "pino";
import { config } from "./config";

export const logger = config.logFile
  ? Pino({
      level: config.logLevel,
      transport: {
        targets: [
          {
            target: "pino/file",
            level: config.logLevel,
            options: {
              destination: config.logFile,
            },
          },
        ],
      },
    })
  : Pino({ level: config.logLevel }, Pino.destination(2));
