import { afterEach, describe, expect, it } from "vitest";
import { StyleRegistry, defineStyleClass } from "@/shared/ui/rendering/styleClass";

describe("StyleRegistry", () => {
    afterEach(() => {
        document.head.innerHTML = "";
    });

    it("reuses the class for identical declarations", () => {
        const registry = new StyleRegistry("t");

        expect(registry.classFor({ color: "red" })).toBe("t-0");
        expect(registry.classFor({ color: "red" })).toBe("t-0");
        expect(registry.classFor({ color: "blue" })).toBe("t-1");
        expect(registry.size).toBe(2);
    });

    it("treats declaration order as significant", () => {
        const registry = new StyleRegistry("t");

        const first = registry.classFor({ color: "red", padding: "0" });
        const second = registry.classFor({ padding: "0", color: "red" });

        expect(first).not.toBe(second);
    });

    it("renders one rule per class", () => {
        const registry = new StyleRegistry("t");
        registry.classFor({ color: "red", "font-weight": "bold" });
        registry.classFor({ color: "blue" });

        expect(registry.cssText()).toBe(
            ".t-0 { color: red; font-weight: bold; }\n.t-1 { color: blue; }\n",
        );
    });

    it("writes rules into a single style element, including later ones", () => {
        const registry = new StyleRegistry("t");
        registry.classFor({ color: "red" });

        const element = registry.attach(document);
        registry.classFor({ color: "blue" });

        expect(registry.attach(document)).toBe(element);
        expect(document.head.querySelectorAll('style[data-glyphscale="t"]')).toHaveLength(1);
        expect(element.textContent).toBe(registry.cssText());
    });
});

describe("defineStyleClass", () => {
    it("registers on first use and returns the same class afterwards", () => {
        const registry = new StyleRegistry("t");
        const pill = defineStyleClass({ "border-radius": "1000rem" }, registry);

        expect(registry.size).toBe(0);
        expect(pill()).toBe("t-0");
        expect(pill()).toBe("t-0");
        expect(registry.size).toBe(1);
    });
});
