import { STANDARD_FONT_DECLARATIONS } from "@/config/textRoles";
import { defineStyleClass } from "@/shared/ui/rendering/styleClass";

export const standardFontClass = defineStyleClass(STANDARD_FONT_DECLARATIONS);
