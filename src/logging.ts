import pino from "pino";

export type ILogger = Pick<pino.Logger, "debug" | "info" | "warn" | "error" | "child">;

export const makeLogger = (level: pino.LevelWithSilent = "info", pretty = false): ILogger =>
  pretty
    ? pino({
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l" },
        },
      })
    : pino({ level });
