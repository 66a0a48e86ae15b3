/**
 * Iconography configuration shared across the UI.
 * Icon stroke weights track the weight of the text they sit next to.
 */
import { DEFAULT_ICON_SIZE } from "./logic";
import type { FontWeight } from "./typeScale";

export interface IconStyle {
    readonly size: number;
    /** Stroke width in px; `null` leaves the glyph's own default in place. */
    readonly weight: number | null;
}

export const ICON_WEIGHT_BY_FONT_WEIGHT: Readonly<
    Partial<Record<FontWeight, number>>
> = Object.freeze({
    bold: 3,
    "600": 2.5,
    normal: 2,
});

export const fontWeightToIconWeight = (
    weight: FontWeight | null,
): number | null => {
    if (weight === null) return null;
    return ICON_WEIGHT_BY_FONT_WEIGHT[weight] ?? null;
};

export const createIconStyle = (
    size: number = DEFAULT_ICON_SIZE,
): IconStyle => ({
    size,
    weight: null,
});
