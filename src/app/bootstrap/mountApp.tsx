import { StrictMode } from "react";
import { createRoot, type Root } from "react-dom/client";
import App from "@/app/App";
import {
    styleRegistry,
    type StyleRegistry,
} from "@/shared/ui/rendering/styleClass";
import { StartupError } from "@/shared/utils/errors";
import { infraLogger } from "@/shared/utils/infraLogger";

const APP_HOST_ATTRIBUTE = "data-glyphscale-root";

export interface MountedApp {
    host: HTMLElement;
    root: Root;
    unmount: () => void;
}

/**
 * Attaches the shared stylesheet and renders the app into a new host element
 * at the end of `doc.body`.
 */
export function mountApp(
    doc: Document,
    registry: StyleRegistry = styleRegistry,
): MountedApp {
    const body = doc.body;
    if (!body) {
        throw new StartupError(
            "bootstrap",
            "Document has no body to mount into",
        );
    }
    registry.attach(doc);

    const host = doc.createElement("div");
    host.setAttribute(APP_HOST_ATTRIBUTE, "");
    body.appendChild(host);

    const root = createRoot(host);
    root.render(
        <StrictMode>
            <App />
        </StrictMode>,
    );
    infraLogger.debug({
        scope: "bootstrap",
        event: "mounted",
        message: "App mounted",
    });

    return {
        host,
        root,
        unmount: () => {
            root.unmount();
            host.remove();
        },
    };
}

/** Logs uncaught failures with a readable message; development builds only. */
export function installDevDiagnostics(target: Window) {
    const onError = (event: ErrorEvent) => {
        infraLogger.error(
            {
                scope: "runtime",
                event: "uncaught_error",
                message: event.message || "Uncaught error",
                details: { source: event.filename, line: event.lineno },
            },
            event.error,
        );
    };
    const onRejection = (event: PromiseRejectionEvent) => {
        infraLogger.error(
            {
                scope: "runtime",
                event: "unhandled_rejection",
                message: "Unhandled promise rejection",
            },
            event.reason,
        );
    };
    target.addEventListener("error", onError);
    target.addEventListener("unhandledrejection", onRejection);
    return () => {
        target.removeEventListener("error", onError);
        target.removeEventListener("unhandledrejection", onRejection);
    };
}
