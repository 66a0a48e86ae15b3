import { createContext, useContext, useMemo, type ReactNode } from "react";
import { RENDER_DEFAULTS, type RenderConfig } from "@/config/logic";

const RenderConfigContext = createContext<RenderConfig>(RENDER_DEFAULTS);

export interface RenderConfigProviderProps {
    textScale?: number;
    children?: ReactNode;
}

export function RenderConfigProvider({
    textScale = RENDER_DEFAULTS.textScale,
    children,
}: RenderConfigProviderProps) {
    const value = useMemo(() => ({ textScale }), [textScale]);
    return (
        <RenderConfigContext.Provider value={value}>
            {children}
        </RenderConfigContext.Provider>
    );
}

// Falls back to the constants-file defaults outside a provider.
export function useRenderConfig(): RenderConfig {
    return useContext(RenderConfigContext);
}
