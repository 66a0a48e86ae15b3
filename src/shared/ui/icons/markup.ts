import { createMarkupResource } from "@/shared/ui/rendering/markup";

export const ICON_KINDS = ["trash", "plus"] as const;

export type IconKind = (typeof ICON_KINDS)[number];

// Glyphs read their stroke width from --icon-weight where they support it.
export const ICON_MARKUP: Readonly<Record<IconKind, string>> = {
    trash: `
        <svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 24 24"><path fill="none" stroke="currentColor" stroke-linecap="round" stroke-linejoin="round" stroke-width="2" d="M4 6h16l-1.58 14.22A2 2 0 0 1 16.432 22H7.568a2 2 0 0 1-1.988-1.78zm3.345-2.853A2 2 0 0 1 9.154 2h5.692a2 2 0 0 1 1.81 1.147L18 6H6zM2 6h20m-12 5v5m4-5v5"/></svg>
    `,
    plus: `
        <svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 16 16"> <path stroke="currentColor" stroke-linecap="round" stroke-linejoin="round" d="M8 3v10M3 8h10" style="stroke-width: var(--icon-weight, 2);"/></svg>
    `,
};

/** One parse per kind; each call returns an independent `<svg>` copy. */
export const ICON_RESOURCES: Readonly<Record<IconKind, () => Node>> = {
    trash: createMarkupResource(ICON_MARKUP.trash, "image/svg+xml"),
    plus: createMarkupResource(ICON_MARKUP.plus, "image/svg+xml"),
};
