export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
    debug(message: string, fields?: LogFields): void;
    info(message: string, fields?: LogFields): void;
    warn(message: string, fields?: LogFields): void;
    error(message: string, fields?: LogFields): void;
    /** Logger that adds `fields` to every entry. */
    child(fields: LogFields): Logger;
}

export interface LogEntry extends LogFields {
    timestamp: string;
    level: LogLevel;
    component: string;
    message: string;
}

export type LogSink = (level: LogLevel, entry: LogEntry) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVEL_PRIORITY, value);
}

/** `RUST_MCP_LOG_LEVEL` wins; otherwise `RUST_MCP_DEBUG=true` means debug, else info. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const requested = (env.RUST_MCP_LOG_LEVEL ?? "").trim().toLowerCase();
    if (isLogLevel(requested)) return requested;
    return env.RUST_MCP_DEBUG === "true" ? "debug" : "info";
}

// Errors stringify to {} in JSON.
function serializeField(value: unknown): unknown {
    if (value instanceof Error) {
        return value.message;
    }
    return value;
}

const consoleSink: LogSink = (level, entry) => {
    const write = level === "error" ? console.error
        : level === "warn" ? console.warn
        : level === "debug" ? console.debug
        : console.info;
    write(entry);
};

export function createLogger(component: string, options: { level?: LogLevel; sink?: LogSink; fields?: LogFields } = {}): Logger {
    const sink = options.sink ?? consoleSink;
    const bound = options.fields ?? {};

    const log = (level: LogLevel, message: string, fields?: LogFields) => {
        // Read per call so the level follows the environment at the time of logging.
        const threshold = options.level ?? resolveLogLevel();
        if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[threshold]) {
            return;
        }
        const extra: LogFields = {};
        for (const [key, value] of Object.entries({ ...bound, ...fields })) {
            extra[key] = serializeField(value);
        }
        sink(level, {
            ...extra,
            timestamp: new Date().toISOString(),
            level,
            component,
            message
        });
    };

    return {
        debug: (message, fields) => log("debug", message, fields),
        info: (message, fields) => log("info", message, fields),
        warn: (message, fields) => log("warn", message, fields),
        error: (message, fields) => log("error", message, fields),
        child: fields => createLogger(component, { ...options, fields: { ...bound, ...fields } })
    };
}
