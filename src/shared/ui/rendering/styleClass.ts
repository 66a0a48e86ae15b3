import { lazy, type Lazy } from "./lazy";
import { STYLE_CLASS_PREFIX } from "@/config/logic";
import { createScopedLogger } from "@/shared/utils/infraLogger";

/** Kebab-case CSS properties to values, emitted in insertion order. */
export type StyleDeclarations = Readonly<Record<string, string>>;

const STYLE_ELEMENT_ATTRIBUTE = "data-glyphscale";

const log = createScopedLogger("style-registry");

const serializeDeclarations = (declarations: StyleDeclarations) =>
    Object.entries(declarations)
        .map(([property, value]) => `${property}: ${value};`)
        .join(" ");

/**
 * Generates one class name per distinct declaration list and keeps the rules
 * in a single stylesheet. Identical declarations always resolve to the same
 * class.
 */
export class StyleRegistry {
    private readonly classes = new Map<string, string>();
    private readonly rules: string[] = [];
    private styleElement: HTMLStyleElement | null = null;

    constructor(private readonly prefix: string = STYLE_CLASS_PREFIX) {}

    classFor(declarations: StyleDeclarations): string {
        const body = serializeDeclarations(declarations);
        const existing = this.classes.get(body);
        if (existing) {
            return existing;
        }
        const className = `${this.prefix}-${this.classes.size}`;
        const rule = `.${className} { ${body} }`;
        this.classes.set(body, className);
        this.rules.push(rule);
        if (this.styleElement) {
            this.styleElement.appendChild(
                this.styleElement.ownerDocument.createTextNode(`${rule}\n`),
            );
        }
        log.debug({
            event: "class_registered",
            message: `Registered ${className}`,
            details: { className },
        });
        return className;
    }

    get size(): number {
        return this.classes.size;
    }

    cssText(): string {
        return this.rules.map((rule) => `${rule}\n`).join("");
    }

    /**
     * Writes all rules into a `<style>` element in the document head; rules
     * registered later are appended to it. Re-attaching to the same document
     * reuses the element.
     */
    attach(doc: Document): HTMLStyleElement {
        if (this.styleElement && this.styleElement.ownerDocument === doc) {
            return this.styleElement;
        }
        const element = doc.createElement("style");
        element.setAttribute(STYLE_ELEMENT_ATTRIBUTE, this.prefix);
        element.textContent = this.cssText();
        doc.head.appendChild(element);
        this.styleElement = element;
        return element;
    }
}

export const styleRegistry = new StyleRegistry();

/**
 * Call-site memoized class: the declarations are registered on first use and
 * the same class name is returned afterwards.
 */
export const defineStyleClass = (
    declarations: StyleDeclarations,
    registry: StyleRegistry = styleRegistry,
): Lazy<string> =>
    lazy(() => registry.classFor(declarations), "style class");
