interface StartupErrorOptions {
    cause?: unknown;
}

/**
 * Configuration or integration failure discovered while the app starts up
 * (malformed constants, malformed static markup, missing document body).
 * Nothing in the rendering layer catches these.
 */
export class StartupError extends Error {
    readonly scope: string;

    constructor(scope: string, message: string, options?: StartupErrorOptions) {
        super(message, options);
        this.name = "StartupError";
        this.scope = scope;
    }
}

export class MarkupParseError extends StartupError {
    readonly source: string;

    constructor(
        message: string,
        source: string,
        options?: StartupErrorOptions,
    ) {
        super("markup", message, options);
        this.name = "MarkupParseError";
        this.source = source;
    }
}

export class ConfigError extends StartupError {
    readonly issues: readonly string[];

    constructor(message: string, issues: readonly string[]) {
        super("config", message);
        this.name = "ConfigError";
        this.issues = issues;
    }
}

// Raised when a listener sends through its own dispatcher while it is running.
export class DispatchError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "DispatchError";
    }
}

export const isStartupError = (error: unknown): error is StartupError =>
    error instanceof StartupError;

export const describeError = (error: unknown): string => {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === "string") {
        return error;
    }
    return "Unknown error";
};
