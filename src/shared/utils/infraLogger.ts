type InfraLogLevel = "debug" | "info" | "warn" | "error";

type InfraLogValue = string | number | boolean | null | undefined | object;

export type InfraLogDetails = Record<string, InfraLogValue>;

export interface InfraLogEvent {
    scope: string;
    event: string;
    message: string;
    details?: InfraLogDetails;
}

type ConsoleWriter = (...args: unknown[]) => void;

const LOG_PREFIX = "[glyphscale]";

const LEVEL_RANK: Record<InfraLogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

let minimumLevel: InfraLogLevel = "info";

export const setInfraLogLevel = (level: InfraLogLevel) => {
    minimumLevel = level;
};

export const getInfraLogLevel = (): InfraLogLevel => minimumLevel;

const getConsoleMethod = (level: InfraLogLevel): ConsoleWriter | null => {
    if (typeof console === "undefined") {
        return null;
    }
    switch (level) {
        case "debug":
            return typeof console.debug === "function"
                ? console.debug.bind(console)
                : null;
        case "info":
            return typeof console.info === "function"
                ? console.info.bind(console)
                : null;
        case "warn":
            return typeof console.warn === "function"
                ? console.warn.bind(console)
                : null;
        case "error":
            return typeof console.error === "function"
                ? console.error.bind(console)
                : null;
    }
};

const writeLog = (
    level: InfraLogLevel,
    event: InfraLogEvent,
    errorDetail?: unknown,
) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minimumLevel]) {
        return;
    }
    const writer = getConsoleMethod(level);
    if (!writer) {
        return;
    }
    const payload: InfraLogDetails = {
        scope: event.scope,
        event: event.event,
        message: event.message,
        ...(event.details ? { details: event.details } : {}),
    };

    try {
        if (errorDetail === undefined) {
            writer(LOG_PREFIX, payload);
            return;
        }
        writer(LOG_PREFIX, payload, errorDetail);
    } catch {
        // Logging must never break rendering.
    }
};

export const infraLogger = {
    debug(event: InfraLogEvent, errorDetail?: unknown) {
        writeLog("debug", event, errorDetail);
    },
    info(event: InfraLogEvent, errorDetail?: unknown) {
        writeLog("info", event, errorDetail);
    },
    warn(event: InfraLogEvent, errorDetail?: unknown) {
        writeLog("warn", event, errorDetail);
    },
    error(event: InfraLogEvent, errorDetail?: unknown) {
        writeLog("error", event, errorDetail);
    },
} as const;

type ScopedLogEvent = Omit<InfraLogEvent, "scope">;

export interface ScopedLogger {
    debug(event: ScopedLogEvent, errorDetail?: unknown): void;
    info(event: ScopedLogEvent, errorDetail?: unknown): void;
    warn(event: ScopedLogEvent, errorDetail?: unknown): void;
    error(event: ScopedLogEvent, errorDetail?: unknown): void;
}

export const createScopedLogger = (scope: string): ScopedLogger => ({
    debug: (event, errorDetail) =>
        infraLogger.debug({ scope, ...event }, errorDetail),
    info: (event, errorDetail) =>
        infraLogger.info({ scope, ...event }, errorDetail),
    warn: (event, errorDetail) =>
        infraLogger.warn({ scope, ...event }, errorDetail),
    error: (event, errorDetail) =>
        infraLogger.error({ scope, ...event }, errorDetail),
});
