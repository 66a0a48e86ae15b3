import { RENDER_DEFAULTS, TEXT_SCALE_BOUNDS } from "@/config/logic";
import { infraLogger } from "@/shared/utils/infraLogger";

const STORAGE_KEY = "glyphscale.text-scale";

export const clampTextScale = (value: number) =>
    Math.max(TEXT_SCALE_BOUNDS.min, Math.min(TEXT_SCALE_BOUNDS.max, value));

export const stepTextScale = (value: number, direction: 1 | -1) =>
    clampTextScale(value + direction * TEXT_SCALE_BOUNDS.step);

const readStoredScale = (stored: string | null): number | null => {
    if (stored === null) return null;
    const parsed = Number(stored);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        infraLogger.warn({
            scope: "preferences",
            event: "invalid_text_scale",
            message: "Ignoring stored text scale",
            details: { stored },
        });
        return null;
    }
    return clampTextScale(parsed);
};

export const getInitialTextScale = (): number => {
    if (typeof window === "undefined") return RENDER_DEFAULTS.textScale;
    return (
        readStoredScale(window.localStorage.getItem(STORAGE_KEY)) ??
        RENDER_DEFAULTS.textScale
    );
};

export const persistTextScale = (value: number) => {
    if (typeof window === "undefined") return;
    window.localStorage.setItem(STORAGE_KEY, String(clampTextScale(value)));
};

export const getTextScaleStorageKey = () => STORAGE_KEY;
