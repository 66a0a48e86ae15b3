import { StartupError } from "@/shared/utils/errors";

type LazyState<T> =
    | { status: "empty" }
    | { status: "initializing" }
    | { status: "ready"; value: T };

export interface Lazy<T> {
    (): T;
    readonly isInitialized: () => boolean;
}

/**
 * Once-cell: `init` runs on the first call and every later call returns the
 * same value. A throwing `init` leaves the cell empty, so the next access
 * reports the failure again.
 */
export function lazy<T>(init: () => T, label = "lazy value"): Lazy<T> {
    let state: LazyState<T> = { status: "empty" };

    const get = (): T => {
        if (state.status === "ready") {
            return state.value;
        }
        if (state.status === "initializing") {
            throw new StartupError(
                "lazy",
                `${label} was read while it was still being initialized`,
            );
        }
        state = { status: "initializing" };
        try {
            const value = init();
            state = { status: "ready", value };
            return value;
        } catch (error) {
            state = { status: "empty" };
            throw error;
        }
    };

    return Object.assign(get, {
        isInitialized: () => state.status === "ready",
    });
}
