import { Fragment } from "react";
import { useTranslation } from "react-i18next";
import { TYPE_SCALE_NAMES, fontStyle } from "@/config/typeScale";
import type { IconKind } from "@/shared/ui/icons/markup";
import { icon } from "@/shared/ui/components/Icon";
import { text } from "@/shared/ui/components/Text";

// Off-scale entry rendered after the presets.
export const CUSTOM_SHOWCASE_STYLE = fontStyle(18, 24)
    .withWeight("500")
    .withItalic();

const SHOWCASE_ROW_STYLE = {
    display: "flex",
    alignItems: "flex-end",
    flexWrap: "wrap",
    gap: "0.5rem",
} as const;

export function IconScaleShowcase({ kind = "plus" }: { kind?: IconKind }) {
    const { t } = useTranslation();
    return (
        <section data-showcase="icons">
            {text(t("showcase.icons_heading")).headline()}
            <div style={SHOWCASE_ROW_STYLE}>
                {TYPE_SCALE_NAMES.map((name) => (
                    <Fragment key={name}>{icon(kind).preset(name)}</Fragment>
                ))}
                {icon(kind).custom(CUSTOM_SHOWCASE_STYLE)}
            </div>
        </section>
    );
}

export function TextScaleShowcase() {
    const { t } = useTranslation();
    return (
        <section data-showcase="text">
            {text(t("showcase.text_heading")).headline()}
            {TYPE_SCALE_NAMES.map((name) => (
                <Fragment key={name}>
                    {text(t(`showcase.preset.${name}`)).preset(name)}
                </Fragment>
            ))}
            {text(t("showcase.preset.custom")).custom(CUSTOM_SHOWCASE_STYLE)}
        </section>
    );
}
