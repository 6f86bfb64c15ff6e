import pino, { type Logger, type TransportSingleOptions } from "pino";
import type { LoggingConfig } from "../config/types";

let loggerInstance: Logger | null = null;

export function configureLogger(config: LoggingConfig): Logger {
    let transport: TransportSingleOptions | undefined;

    if (config.pretty) {
        try {
            const prettyTarget = require.resolve("pino-pretty");
            transport = {
                target: prettyTarget,
                options: {
                    colorize: true,
                    translateTime: "SYS:standard",
                },
            };
        } catch {
            console.warn(
                '[corpus-chat] "pino-pretty" is not installed. Falling back to JSON logs. Install it or set LOG_PRETTY to false.'
            );
        }
    }

    loggerInstance = pino({
        level: config.level,
        base: undefined,
        transport,
    });
    return loggerInstance;
}

export function getLogger(): Logger {
    if (!loggerInstance) {
        loggerInstance = pino({
            level: process.env.LOG_LEVEL ?? "info",
            base: undefined,
        });
    }
    return loggerInstance;
}
