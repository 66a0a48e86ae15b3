import {
    createElement,
    useRef,
    useState,
    type KeyboardEvent,
    type ReactElement,
    type ReactNode,
} from "react";
import { BUTTON_SURFACE_DECLARATIONS } from "@/config/textRoles";
import { EventDispatcher } from "@/shared/ui/rendering/EventDispatcher";
import { defineStyleClass } from "@/shared/ui/rendering/styleClass";

export const ButtonEvent = {
    Clicked: "clicked",
} as const;

export type ButtonEvent = (typeof ButtonEvent)[keyof typeof ButtonEvent];

export type ButtonEventHandler = (event: ButtonEvent) => void;

// One class for every button; each instance still owns its dispatcher.
const buttonSurfaceClass = defineStyleClass(BUTTON_SURFACE_DECLARATIONS);

export interface ButtonProps {
    onEvent: ButtonEventHandler;
    ariaLabel?: string;
    children?: ReactNode;
}

export function Button({ onEvent, ariaLabel, children }: ButtonProps) {
    const latestHandler = useRef(onEvent);
    latestHandler.current = onEvent;
    const [dispatcher] = useState(() =>
        EventDispatcher.create<ButtonEvent>((event) =>
            latestHandler.current(event),
        ),
    );

    const handleKeyDown = (event: KeyboardEvent<HTMLDivElement>) => {
        if (event.key !== "Enter" && event.key !== " ") return;
        event.preventDefault();
        dispatcher.send(ButtonEvent.Clicked);
    };

    return (
        <div>
            <div
                className={buttonSurfaceClass()}
                role="button"
                tabIndex={0}
                aria-label={ariaLabel}
                onClick={() => dispatcher.send(ButtonEvent.Clicked)}
                onKeyDown={handleKeyDown}
            >
                {children}
            </div>
        </div>
    );
}

export const renderButton = (
    children: Iterable<ReactNode>,
    onEvent: ButtonEventHandler,
): ReactElement => createElement(Button, { onEvent }, ...Array.from(children));
