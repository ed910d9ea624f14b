import pino from "pino";
import { env } from "./env";

const isDev = env.NODE_ENV === "development";

// Reports go to stdout, so logs are written to stderr
export const logger = pino(
  {
    level: env.NODE_ENV === "test" ? "silent" : env.LOG_LEVEL,
    transport: isDev
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
            destination: 2,
          },
        }
      : undefined,
  },
  isDev ? undefined : pino.destination(2)
);

export type Logger = typeof logger;
