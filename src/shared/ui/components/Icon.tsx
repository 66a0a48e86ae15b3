import type { CSSProperties, ReactElement } from "react";
import type { RenderConfig } from "@/config/logic";
import {
    createIconStyle,
    fontWeightToIconWeight,
    type IconStyle,
} from "@/config/iconography";
import {
    TYPE_SCALE,
    scaledSize,
    type FontStyle,
    type TypeScaleName,
} from "@/config/typeScale";
import {
    ICON_MARKUP,
    ICON_RESOURCES,
    type IconKind,
} from "@/shared/ui/icons/markup";
import { serializeMarkup } from "@/shared/ui/rendering/markup";
import { useRenderConfig } from "@/shared/ui/rendering/RenderConfigContext";
import {
    useIsStaticRender,
    useMountedMarkup,
} from "@/shared/ui/rendering/useMountedMarkup";
import { standardFontClass } from "./standardFont";

export type IconContainerStyle = CSSProperties & {
    "--icon-weight"?: string;
};

// The stroke weight is a line width, not a dimension; the text scale
// leaves it alone.
export const iconContainerStyle = (
    style: IconStyle,
    config: RenderConfig,
): IconContainerStyle => {
    const size = scaledSize(style.size, config.textScale);
    return {
        display: "inline-block",
        width: size,
        height: size,
        ...(style.weight !== null
            ? { "--icon-weight": `${style.weight}px` }
            : {}),
    };
};

export interface IconGlyphProps {
    kind: IconKind;
    iconStyle: IconStyle;
}

export function IconGlyph({ kind, iconStyle }: IconGlyphProps) {
    const config = useRenderConfig();
    const isStaticRender = useIsStaticRender();
    const mountGlyph = useMountedMarkup<HTMLDivElement>(ICON_RESOURCES[kind]);
    // String renders cannot mount nodes, so they carry the cached glyph text.
    const staticGlyph = isStaticRender
        ? { __html: serializeMarkup(ICON_MARKUP[kind], "image/svg+xml") }
        : undefined;
    return (
        <div
            ref={mountGlyph}
            className={standardFontClass()}
            data-icon={kind}
            style={iconContainerStyle(iconStyle, config)}
            dangerouslySetInnerHTML={staticGlyph}
        />
    );
}

/**
 * Fluent icon builder. Every modifier returns a new helper; a terminal
 * method sizes the icon from a type-scale preset and renders it.
 *
 * ```tsx
 * icon("plus").title();
 * icon("trash").customSize(24).weight(1.5).finish();
 * ```
 */
export class IconHelper {
    constructor(
        readonly kind: IconKind,
        readonly style: IconStyle = createIconStyle(),
    ) {}

    customSize(size: number): IconHelper {
        return new IconHelper(this.kind, { ...this.style, size });
    }

    weight(weight: number): IconHelper {
        return new IconHelper(this.kind, { ...this.style, weight });
    }

    /** Matches the icon to text set in `fontStyle`. */
    font(fontStyle: FontStyle): IconHelper {
        const weight = fontWeightToIconWeight(fontStyle.weight);
        return new IconHelper(this.kind, {
            size: fontStyle.size,
            weight: weight ?? this.style.weight,
        });
    }

    finish(): ReactElement {
        return <IconGlyph kind={this.kind} iconStyle={this.style} />;
    }

    custom(fontStyle: FontStyle): ReactElement {
        return this.font(fontStyle).finish();
    }

    preset(name: TypeScaleName): ReactElement {
        return this.custom(TYPE_SCALE[name]);
    }

    largeTitle(): ReactElement {
        return this.preset("largeTitle");
    }

    title(): ReactElement {
        return this.preset("title");
    }

    title2(): ReactElement {
        return this.preset("title2");
    }

    title3(): ReactElement {
        return this.preset("title3");
    }

    headline(): ReactElement {
        return this.preset("headline");
    }

    body(): ReactElement {
        return this.preset("body");
    }

    callout(): ReactElement {
        return this.preset("callout");
    }

    subheadline(): ReactElement {
        return this.preset("subheadline");
    }

    footnote(): ReactElement {
        return this.preset("footnote");
    }

    caption(): ReactElement {
        return this.preset("caption");
    }

    caption2(): ReactElement {
        return this.preset("caption2");
    }
}

export const icon = (kind: IconKind) => new IconHelper(kind);
