import { z } from "zod";
import constants from "./constants.json";
import { ConfigError } from "@/shared/utils/errors";

// Design system: every emitted pixel value is a type-scale constant times
// the active text scale. JSON carries the defaults and the allowed range.

const zPositive = z.number().finite().positive();

const zRenderConstants = z
    .object({
        text_scale: zPositive,
        text_scale_min: zPositive,
        text_scale_max: zPositive,
        text_scale_step: zPositive,
        font_family: z.string().min(1),
        class_prefix: z
            .string()
            .regex(/^[a-z][a-z0-9-]*$/, "must be a lowercase CSS identifier"),
    })
    .refine((render) => render.text_scale_min <= render.text_scale_max, {
        message: "text_scale_min must not exceed text_scale_max",
        path: ["text_scale_min"],
    })
    .refine(
        (render) =>
            render.text_scale >= render.text_scale_min &&
            render.text_scale <= render.text_scale_max,
        {
            message: "text_scale must lie within the allowed range",
            path: ["text_scale"],
        },
    );

export const zConstants = z.object({
    render: zRenderConstants,
    icon: z.object({
        default_size: zPositive,
    }),
    layout: z.object({
        root_padding: z.string().min(1),
    }),
});

export type Constants = z.infer<typeof zConstants>;

export const parseConstants = (raw: unknown): Constants => {
    const result = zConstants.safeParse(raw);
    if (result.success) {
        return result.data;
    }
    const issues = result.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigError(
        `Invalid render constants: ${issues.join("; ")}`,
        issues,
    );
};

// Single-owner export for all config consumers
export const CONFIG = parseConstants(constants);

export interface RenderConfig {
    /** Multiplies every emitted pixel dimension. */
    textScale: number;
}

export const RENDER_DEFAULTS: Readonly<RenderConfig> = Object.freeze({
    textScale: CONFIG.render.text_scale,
});

export const STANDARD_FONT_FAMILY = CONFIG.render.font_family;

export const TEXT_SCALE_BOUNDS = Object.freeze({
    min: CONFIG.render.text_scale_min,
    max: CONFIG.render.text_scale_max,
    step: CONFIG.render.text_scale_step,
});

export const STYLE_CLASS_PREFIX = CONFIG.render.class_prefix;

export const DEFAULT_ICON_SIZE = CONFIG.icon.default_size;

export const ROOT_PADDING = CONFIG.layout.root_padding;
