import { useTranslation } from "react-i18next";
import { Button } from "@/shared/ui/components/Button";
import { icon } from "@/shared/ui/components/Icon";
import { text } from "@/shared/ui/components/Text";

export interface TextScaleControlsProps {
    textScale: number;
    onIncrease: () => void;
    onReset: () => void;
}

export function TextScaleControls({
    textScale,
    onIncrease,
    onReset,
}: TextScaleControlsProps) {
    const { t } = useTranslation();
    return (
        <div style={{ display: "flex", alignItems: "center", gap: "0.5rem" }}>
            <Button ariaLabel={t("scale.increase")} onEvent={onIncrease}>
                {icon("plus").body()}
            </Button>
            <Button ariaLabel={t("scale.reset")} onEvent={onReset}>
                {icon("trash").body()}
            </Button>
            {text(t("scale.label", { value: textScale })).footnote()}
        </div>
    );
}
