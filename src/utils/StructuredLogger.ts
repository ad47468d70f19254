const ENABLE_DEBUG_LOGS = process.env.GRAPH_REFACTOR_DEBUG === "true";
const ENV_LOG_LEVEL = (process.env.GRAPH_REFACTOR_LOG_LEVEL ?? "").toLowerCase();

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
    debug(message: string, fields?: Record<string, unknown>): void;
    info(message: string, fields?: Record<string, unknown>): void;
    warn(message: string, fields?: Record<string, unknown>): void;
    error(message: string, fields?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

/** Error instances become plain objects before serialization. */
function serializeField(value: unknown): unknown {
    if (value instanceof Error) {
        return { name: value.name, message: value.message, stack: value.stack };
    }
    return value;
}

export function createLogger(component: string): Logger {
    const configuredLevel: LogLevel = isLogLevel(ENV_LOG_LEVEL)
        ? ENV_LOG_LEVEL
        : (ENABLE_DEBUG_LOGS ? "debug" : "info");

    const log = (level: LogLevel, message: string, fields?: Record<string, unknown>) => {
        if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[configuredLevel]) {
            return;
        }
        const payload: Record<string, unknown> = {
            timestamp: new Date().toISOString(),
            level,
            component,
            message
        };
        for (const [key, value] of Object.entries(fields ?? {})) {
            payload[key] = serializeField(value);
        }
        // stdout carries the MCP channel
        process.stderr.write(JSON.stringify(payload) + "\n");
    };

    return {
        debug: (message, fields) => log("debug", message, fields),
        info: (message, fields) => log("info", message, fields),
        warn: (message, fields) => log("warn", message, fields),
        error: (message, fields) => log("error", message, fields)
    };
}
