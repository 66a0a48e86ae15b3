import i18n from "i18next";
import { initReactI18next } from "react-i18next";

import en from "./en.json";

const FALLBACK_LANGUAGE = "en";

void i18n.use(initReactI18next).init({
    resources: {
        en: { translation: en },
    },
    fallbackLng: FALLBACK_LANGUAGE,
    lng: FALLBACK_LANGUAGE,
    supportedLngs: [FALLBACK_LANGUAGE],
    interpolation: { escapeValue: false },
    initImmediate: false,
});

export default i18n;
