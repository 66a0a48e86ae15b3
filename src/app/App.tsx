import { useCallback, useState } from "react";
import { useTranslation } from "react-i18next";
import { RENDER_DEFAULTS, ROOT_PADDING } from "@/config/logic";
import {
    getInitialTextScale,
    persistTextScale,
    stepTextScale,
} from "@/app/preferences/textScale";
import { ClickCounter } from "@/app/components/ClickCounter";
import { TextScaleControls } from "@/app/components/TextScaleControls";
import {
    IconScaleShowcase,
    TextScaleShowcase,
} from "@/app/components/TypeScaleShowcase";
import { text } from "@/shared/ui/components/Text";
import { RenderConfigProvider } from "@/shared/ui/rendering/RenderConfigContext";

export default function App() {
    const { t } = useTranslation();
    const [textScale, setTextScale] = useState(getInitialTextScale);

    const applyTextScale = useCallback((next: number) => {
        setTextScale(next);
        persistTextScale(next);
    }, []);

    return (
        <RenderConfigProvider textScale={textScale}>
            <div style={{ padding: ROOT_PADDING }}>
                {text(t("app.title")).largeTitle()}
                {text(t("app.body_sample")).body()}
                <TextScaleControls
                    textScale={textScale}
                    onIncrease={() =>
                        applyTextScale(stepTextScale(textScale, 1))
                    }
                    onReset={() => applyTextScale(RENDER_DEFAULTS.textScale)}
                />
                <ClickCounter />
                <IconScaleShowcase />
                <TextScaleShowcase />
            </div>
        </RenderConfigProvider>
    );
}
