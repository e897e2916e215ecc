import pino, { type DestinationStream, type Logger } from "pino";
import type { LogLevel } from "./config/schema";

export type { Logger };

export const createLogger = (level: LogLevel, destination?: DestinationStream): Logger => {
  return pino(
    { name: "profile-dedupe", level },
    destination ?? pino.destination({ dest: 2, sync: true }),
  );
};
