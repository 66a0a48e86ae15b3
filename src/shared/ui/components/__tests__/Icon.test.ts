import React from "react";
import { renderToStaticMarkup } from "react-dom/server";
import { afterEach, describe, expect, it } from "vitest";
import { fontWeightToIconWeight } from "@/config/iconography";
import { TYPE_SCALE, TYPE_SCALE_NAMES, fontStyle } from "@/config/typeScale";
import { icon, iconContainerStyle } from "@/shared/ui/components/Icon";
import { standardFontClass } from "@/shared/ui/components/standardFont";
import { ICON_MARKUP, type IconKind } from "@/shared/ui/icons/markup";
import { serializeMarkup } from "@/shared/ui/rendering/markup";
import { RenderConfigProvider } from "@/shared/ui/rendering/RenderConfigContext";
import {
    mountElement,
    requireElement,
    waitForCondition,
} from "@/tests/domHarness";

const glyphMarkup = (kind: IconKind) =>
    serializeMarkup(ICON_MARKUP[kind], "image/svg+xml");

const expectedMarkup = (kind: IconKind, style: string) =>
    `<div class="${standardFontClass()}" data-icon="${kind}" style="${style}">${glyphMarkup(kind)}</div>`;

describe("icon helper", () => {
    it("sizes a title icon to 28px with a bold stroke", () => {
        const markup = renderToStaticMarkup(icon("plus").title());

        expect(markup).toContain('<svg xmlns="http://www.w3.org/2000/svg"');
        expect(markup).toContain('d="M8 3v10M3 8h10"');
        expect(markup).toBe(
            expectedMarkup(
                "plus",
                "display:inline-block;width:28px;height:28px;--icon-weight:3px",
            ),
        );
    });

    it("leaves the stroke unset for presets without a weight", () => {
        expect(renderToStaticMarkup(icon("trash").body())).toBe(
            expectedMarkup(
                "trash",
                "display:inline-block;width:17px;height:17px",
            ),
        );
    });

    it("maps the semibold headline to a 2.5px stroke", () => {
        expect(renderToStaticMarkup(icon("plus").headline())).toBe(
            expectedMarkup(
                "plus",
                "display:inline-block;width:17px;height:17px;--icon-weight:2.5px",
            ),
        );
    });

    it("keeps an explicit weight when the preset has none", () => {
        expect(renderToStaticMarkup(icon("plus").weight(1.5).body())).toBe(
            expectedMarkup(
                "plus",
                "display:inline-block;width:17px;height:17px;--icon-weight:1.5px",
            ),
        );
    });

    it("derives size and weight from a custom font style", () => {
        const custom = fontStyle(10, 12).withWeight("normal");

        expect(renderToStaticMarkup(icon("plus").custom(custom))).toBe(
            expectedMarkup(
                "plus",
                "display:inline-block;width:10px;height:10px;--icon-weight:2px",
            ),
        );
    });

    it("defaults to 16px and honours a custom size", () => {
        expect(renderToStaticMarkup(icon("plus").finish())).toBe(
            expectedMarkup(
                "plus",
                "display:inline-block;width:16px;height:16px",
            ),
        );
        expect(renderToStaticMarkup(icon("plus").customSize(24).finish())).toBe(
            expectedMarkup(
                "plus",
                "display:inline-block;width:24px;height:24px",
            ),
        );
    });

    it("scales dimensions but not the stroke weight", () => {
        const markup = renderToStaticMarkup(
            React.createElement(
                RenderConfigProvider,
                { textScale: 2 },
                icon("plus").title(),
            ),
        );

        expect(markup).toBe(
            expectedMarkup(
                "plus",
                "display:inline-block;width:56px;height:56px;--icon-weight:3px",
            ),
        );
    });

    it("never changes the helper it was derived from", () => {
        const base = icon("plus");
        const sized = base.customSize(40).weight(2);

        expect(base.style).toEqual({ size: 16, weight: null });
        expect(sized.style).toEqual({ size: 40, weight: 2 });
        expect(base.font(TYPE_SCALE.title2).style).toEqual({
            size: 22,
            weight: 3,
        });
    });
});

describe("icon helper presets", () => {
    it.each(TYPE_SCALE_NAMES)("renders %s with its scale entry", (name) => {
        const preset = TYPE_SCALE[name];
        const expected = renderToStaticMarkup(
            React.createElement("div", {
                className: standardFontClass(),
                "data-icon": "trash",
                style: iconContainerStyle(
                    {
                        size: preset.size,
                        weight: fontWeightToIconWeight(preset.weight),
                    },
                    { textScale: 1 },
                ),
                dangerouslySetInnerHTML: { __html: glyphMarkup("trash") },
            }),
        );

        expect(renderToStaticMarkup(icon("trash")[name]())).toBe(expected);
    });
});

describe("iconContainerStyle", () => {
    it("matches the text helper's preset sizes", () => {
        const style = { size: TYPE_SCALE.title2.size, weight: 3 };

        expect(iconContainerStyle(style, { textScale: 1 })).toEqual({
            display: "inline-block",
            width: "22px",
            height: "22px",
            "--icon-weight": "3px",
        });
    });
});

describe("mounted icons", () => {
    afterEach(() => {
        document.body.innerHTML = "";
    });

    it("mounts an independent copy of the glyph into each icon", async () => {
        const mounted = mountElement(
            React.createElement(
                "div",
                null,
                React.createElement(
                    React.Fragment,
                    { key: "a" },
                    icon("plus").title(),
                ),
                React.createElement(
                    React.Fragment,
                    { key: "b" },
                    icon("plus").caption(),
                ),
            ),
        );
        try {
            await waitForCondition(
                () => mounted.container.querySelectorAll("svg").length === 2,
            );
            const hosts =
                mounted.container.querySelectorAll('[data-icon="plus"]');
            const first = requireElement(
                hosts[0]?.firstElementChild,
                "first svg",
            );
            const second = requireElement(
                hosts[1]?.firstElementChild,
                "second svg",
            );

            expect(first.localName).toBe("svg");
            expect(first).not.toBe(second);
            expect(first.isEqualNode(second)).toBe(true);
            expect(first.getElementsByTagName("path")[0]?.getAttribute("d")).toBe(
                "M8 3v10M3 8h10",
            );
        } finally {
            mounted.cleanup();
        }
    });

    it("empties the host when the icon unmounts", async () => {
        const mounted = mountElement(icon("trash").body());
        await waitForCondition(
            () => mounted.container.querySelector("svg") !== null,
        );
        const host = requireElement(
            mounted.container.querySelector('[data-icon="trash"]'),
            "trash host",
        );

        mounted.cleanup();

        expect(host.childNodes).toHaveLength(0);
    });
});
