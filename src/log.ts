import pino, { type Logger } from "pino";
import { isTestEnv } from "./util/env.js";

let root: Logger | null = null;

function rootLogger(): Logger {
    if (root) return root;
    const level = isTestEnv() ? "silent" : (process.env.LOG_LEVEL || "info");
    const options: pino.LoggerOptions = {
        base: undefined,
        level,
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    };
    if (process.env.LEDGER_PRETTY_LOGS === "1" && !isTestEnv()) {
        const transport = pino.transport({
            target: "pino-pretty",
            options: {
                translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
                colorize: true,
                ignore: "pid,hostname",
            },
        });
        root = pino(options, transport);
    } else {
        root = pino(options);
    }
    return root;
}

/** Scoped child logger; every line carries `scope`. */
export function createLogger(scope: string): Logger {
    return rootLogger().child({ scope });
}
