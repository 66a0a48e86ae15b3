import "@/i18n/index";
import { installDevDiagnostics, mountApp } from "@/app/bootstrap/mountApp";
import { describeError, isStartupError } from "@/shared/utils/errors";
import { infraLogger, setInfraLogLevel } from "@/shared/utils/infraLogger";

if (import.meta.env.DEV) {
    setInfraLogLevel("debug");
    installDevDiagnostics(window);
}

try {
    mountApp(document);
} catch (error) {
    infraLogger.error(
        {
            scope: isStartupError(error) ? error.scope : "bootstrap",
            event: "startup_failed",
            message: describeError(error),
        },
        error,
    );
    throw error;
}
