import { useState } from "react";
import { useTranslation } from "react-i18next";
import { renderButton } from "@/shared/ui/components/Button";
import { text } from "@/shared/ui/components/Text";

export function ClickCounter() {
    const { t } = useTranslation();
    const [count, setCount] = useState(0);
    return (
        <div data-counter={count}>
            {renderButton([text(t("counter.button")).body()], () =>
                setCount((current) => current + 1),
            )}
            {text(t("counter.value", { count })).caption()}
        </div>
    );
}
