/**
 * Typographic presets shared by text and icons.
 *
 * Sizes and leadings are unscaled pixels. The icon helper and the text helper
 * both read `TYPE_SCALE`, so a preset always means the same
 * (size, leading, weight) for either of them.
 *
 * Usage:
 * ```ts
 * text("Inbox").title2();
 * icon("plus").title2();
 * text("Note").custom(fontStyle(18, 24).withWeight("500").withItalic());
 * ```
 */

export type FontWeight =
    | "normal"
    | "bold"
    | "100"
    | "200"
    | "300"
    | "400"
    | "500"
    | "600"
    | "700"
    | "800"
    | "900";

export interface FontStyle {
    readonly size: number;
    readonly leading: number;
    readonly weight: FontWeight | null;
    readonly italic: boolean;
}

/**
 * Immutable `FontStyle` with fluent modifiers; every modifier returns a new
 * instance.
 */
export class FontStyleBuilder implements FontStyle {
    readonly size: number;
    readonly leading: number;
    readonly weight: FontWeight | null;
    readonly italic: boolean;

    constructor(
        size: number,
        leading: number,
        weight: FontWeight | null = null,
        italic = false,
    ) {
        this.size = size;
        this.leading = leading;
        this.weight = weight;
        this.italic = italic;
        Object.freeze(this);
    }

    withWeight(weight: FontWeight): FontStyleBuilder {
        return new FontStyleBuilder(
            this.size,
            this.leading,
            weight,
            this.italic,
        );
    }

    withItalic(): FontStyleBuilder {
        return new FontStyleBuilder(this.size, this.leading, this.weight, true);
    }
}

export const fontStyle = (size: number, leading: number): FontStyleBuilder =>
    new FontStyleBuilder(size, leading);

// ============================================================================
// Presets
// ============================================================================

export const TYPE_SCALE = {
    largeTitle: fontStyle(34, 41).withWeight("bold"),
    title: fontStyle(28, 34).withWeight("bold"),
    title2: fontStyle(22, 28).withWeight("bold"),
    title3: fontStyle(20, 25).withWeight("bold"),
    headline: fontStyle(17, 22).withWeight("600"),
    body: fontStyle(17, 22),
    callout: fontStyle(16, 21).withItalic(),
    subheadline: fontStyle(15, 20),
    footnote: fontStyle(13, 18),
    caption: fontStyle(12, 16),
    caption2: fontStyle(11, 13),
} as const satisfies Record<string, FontStyle>;

export type TypeScaleName = keyof typeof TYPE_SCALE;

// Largest to smallest; showcases render in this order.
export const TYPE_SCALE_NAMES: readonly TypeScaleName[] = [
    "largeTitle",
    "title",
    "title2",
    "title3",
    "headline",
    "body",
    "callout",
    "subheadline",
    "footnote",
    "caption",
    "caption2",
];

/** Pixel length of `size` under the given text scale, e.g. `"25.5px"`. */
export const scaledSize = (size: number, textScale: number): string =>
    `${size * textScale}px`;
