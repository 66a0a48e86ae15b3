/**
 * Class declarations shared by text blocks, icons and buttons.
 *
 * These are registered once with the style registry (see
 * `shared/ui/rendering/styleClass.ts`); sizes never live here because they
 * depend on the active text scale and are emitted inline.
 */
import { STANDARD_FONT_FAMILY } from "./logic";

export const STANDARD_FONT_DECLARATIONS = {
    "font-family": STANDARD_FONT_FAMILY,
    color: "inherit",
} as const;

export const BUTTON_SURFACE_DECLARATIONS = {
    display: "flex",
    "align-items": "center",
    "justify-content": "center",
    background: "white",
    border: "1px solid rgba(0, 0, 0, 0.2)",
    color: "black",
    padding: "0.5rem",
    "border-radius": "1000rem",
    cursor: "pointer",
} as const;
