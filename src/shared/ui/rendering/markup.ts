import { ResourceCache } from "./resourceCache";
import { MarkupParseError } from "@/shared/utils/errors";
import { createScopedLogger } from "@/shared/utils/infraLogger";

export type MarkupType = "image/svg+xml" | "text/html";

const SVG_NAMESPACE = "http://www.w3.org/2000/svg";

const log = createScopedLogger("markup");

const fail = (message: string, source: string): never => {
    log.error({
        event: "parse_failed",
        message,
        details: { length: source.length },
    });
    throw new MarkupParseError(message, source);
};

const createParser = (source: string): DOMParser => {
    if (typeof DOMParser === "undefined") {
        return fail("DOMParser is not available in this environment", source);
    }
    return new DOMParser();
};

const parseSvg = (source: string): Node => {
    const doc = createParser(source).parseFromString(
        source.trim(),
        "image/svg+xml",
    );
    const parserError = doc.getElementsByTagName("parsererror")[0];
    if (parserError) {
        const detail = parserError.textContent?.trim() || "parse error";
        return fail(`Malformed SVG markup: ${detail}`, source);
    }
    const root = doc.documentElement;
    if (root.localName !== "svg") {
        return fail(
            `Expected an <svg> root, found <${root.localName}>`,
            source,
        );
    }
    // Without the SVG namespace the element parses but never draws.
    if (root.namespaceURI !== SVG_NAMESPACE) {
        return fail(
            `Expected an <svg> root in the SVG namespace, found ${
                root.namespaceURI ?? "no namespace"
            }`,
            source,
        );
    }
    return root;
};

const parseHtml = (source: string): Node => {
    const doc = createParser(source).parseFromString(source, "text/html");
    const body = doc.body;
    if (!body) {
        return fail("Parsed HTML document has no body", source);
    }
    const fragment = doc.createDocumentFragment();
    for (const child of Array.from(body.childNodes)) {
        fragment.appendChild(child.cloneNode(true));
    }
    return fragment;
};

/**
 * Parses static markup into a detached node tree. SVG sources yield their
 * `<svg>` element; HTML sources yield a fragment of the body's children.
 * Throws `MarkupParseError` when the source is malformed.
 */
export const parseMarkup = (
    source: string,
    type: MarkupType = "text/html",
): Node => (type === "image/svg+xml" ? parseSvg(source) : parseHtml(source));

// Keyed by type and source text, so each distinct markup is parsed once.
const parsedMarkup = new ResourceCache<string, Node>("parsed markup");

const cacheKey = (source: string, type: MarkupType) => `${type}\n${source}`;

const parsed = (source: string, type: MarkupType): Node =>
    parsedMarkup.getOrInit(cacheKey(source, type), () =>
        parseMarkup(source, type),
    );

/**
 * Parse once, clone per use. Every call returns an independent deep copy the
 * renderer may mount and mutate freely.
 */
export const cloneMarkup = (
    source: string,
    type: MarkupType = "text/html",
): Node => parsed(source, type).cloneNode(true);

export const createMarkupResource =
    (source: string, type: MarkupType = "text/html") =>
    (): Node =>
        cloneMarkup(source, type);

const serializedMarkup = new ResourceCache<string, string>("serialized markup");

const serializeNode = (node: Node, type: MarkupType): string => {
    if (type === "image/svg+xml") {
        return new XMLSerializer().serializeToString(node);
    }
    const holder = document.createElement("div");
    holder.appendChild(node.cloneNode(true));
    return holder.innerHTML;
};

/**
 * Text form of the cached parse, for renderers that emit strings instead of
 * mounting nodes.
 */
export const serializeMarkup = (
    source: string,
    type: MarkupType = "text/html",
): string =>
    serializedMarkup.getOrInit(cacheKey(source, type), () =>
        serializeNode(parsed(source, type), type),
    );

export const isMarkupParsed = (
    source: string,
    type: MarkupType = "text/html",
): boolean => parsedMarkup.has(cacheKey(source, type));
