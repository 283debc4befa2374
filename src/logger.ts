export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const PREFIX: Record<LogLevel, string> = {
    debug: "[DEBUG]",
    info: "[OK]",
    warn: "[WARN]",
    error: "❌ [ERROR]",
};

export interface Logger {
    debug(message: string, ...extra: unknown[]): void;
    info(message: string, ...extra: unknown[]): void;
    warn(message: string, ...extra: unknown[]): void;
    error(message: string, ...extra: unknown[]): void;
}

let threshold: LogLevel = parseLevel(process.env.LOG_LEVEL);

function parseLevel(raw: string | undefined): LogLevel {
    const v = raw?.trim().toLowerCase();
    return v === "debug" || v === "info" || v === "warn" || v === "error" ? v : "info";
}

export function setLogLevel(level: LogLevel) {
    threshold = level;
}

export function createLogger(scope: string): Logger {
    const emit = (level: LogLevel, message: string, extra: unknown[]) => {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
        const line = `${PREFIX[level]} ${scope}: ${message}`;
        if (level === "error") console.error(line, ...extra);
        else if (level === "warn") console.warn(line, ...extra);
        else console.log(line, ...extra);
    };
    return {
        debug: (m, ...x) => emit("debug", m, x),
        info: (m, ...x) => emit("info", m, x),
        warn: (m, ...x) => emit("warn", m, x),
        error: (m, ...x) => emit("error", m, x),
    };
}
