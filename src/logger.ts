import pino, { type LoggerOptions, type TransportTargetOptions } from "pino";
import { config } from "./config";

const options: LoggerOptions = {
  level: config.logLevel,
};

const targets: TransportTargetOptions[] = [
  config.env === "development"
    ? { target: "pino-pretty", level: config.logLevel, options: { destination: 1 } }
    : { target: "pino/file", level: config.logLevel, options: { destination: 1 } },
];

if (config.logFile) {
  targets.push({
    target: "pino/file",
    level: config.logLevel,
    options: { destination: config.logFile, mkdir: true },
  });
}

export const logger =
  config.logFile || config.env === "development"
    ? pino(options, pino.transport({ targets }))
    : pino(options);
