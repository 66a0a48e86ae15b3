import { DispatchError } from "@/shared/utils/errors";

export type EventListener<E> = (event: E) => void;

interface ListenerSlot<E> {
    readonly listener: EventListener<E>;
    dispatching: boolean;
}

/**
 * Single-slot relay from a component to its owner's callback. Clones share
 * the slot, so every handle reaches the same listener.
 */
export class EventDispatcher<E> {
    private constructor(private readonly slot: ListenerSlot<E>) {}

    static create<E>(listener: EventListener<E>): EventDispatcher<E> {
        return new EventDispatcher<E>({ listener, dispatching: false });
    }

    /**
     * Calls the listener synchronously. A send from inside the listener is
     * rejected with `DispatchError`; the slot is released even if the
     * listener throws.
     */
    send(event: E): void {
        if (this.slot.dispatching) {
            throw new DispatchError(
                "EventDispatcher.send was called while its listener was still running",
            );
        }
        this.slot.dispatching = true;
        try {
            this.slot.listener(event);
        } finally {
            this.slot.dispatching = false;
        }
    }

    clone(): EventDispatcher<E> {
        return new EventDispatcher<E>(this.slot);
    }

    sharesSlotWith(other: EventDispatcher<E>): boolean {
        return this.slot === other.slot;
    }
}
