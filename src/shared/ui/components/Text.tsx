import type { CSSProperties, ReactElement } from "react";
import type { RenderConfig } from "@/config/logic";
import {
    TYPE_SCALE,
    scaledSize,
    type FontStyle,
    type FontWeight,
    type TypeScaleName,
} from "@/config/typeScale";
import { useRenderConfig } from "@/shared/ui/rendering/RenderConfigContext";
import { standardFontClass } from "./standardFont";

// Numeric weights are unitless in CSS; React prints them as-is.
export const cssFontWeight = (weight: FontWeight): "normal" | "bold" | number =>
    weight === "normal" || weight === "bold" ? weight : Number(weight);

export const textBlockStyle = (
    style: FontStyle,
    config: RenderConfig,
): CSSProperties => ({
    fontSize: scaledSize(style.size, config.textScale),
    lineHeight: scaledSize(style.leading, config.textScale),
    ...(style.weight !== null
        ? { fontWeight: cssFontWeight(style.weight) }
        : {}),
    ...(style.italic ? { fontStyle: "italic" } : {}),
});

export interface StyledTextProps {
    text: string;
    fontStyle: FontStyle;
}

export function StyledText({ text, fontStyle }: StyledTextProps) {
    const config = useRenderConfig();
    return (
        <div
            className={standardFontClass()}
            style={textBlockStyle(fontStyle, config)}
        >
            {text}
        </div>
    );
}

export class TextHelper {
    constructor(private readonly content: string) {}

    renderWithStyle(fontStyle: FontStyle): ReactElement {
        return <StyledText text={this.content} fontStyle={fontStyle} />;
    }

    custom(fontStyle: FontStyle): ReactElement {
        return this.renderWithStyle(fontStyle);
    }

    preset(name: TypeScaleName): ReactElement {
        return this.renderWithStyle(TYPE_SCALE[name]);
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

export const text = (content: string) => new TextHelper(content);
