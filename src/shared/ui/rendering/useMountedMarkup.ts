import {
    useCallback,
    useRef,
    useSyncExternalStore,
    type RefCallback,
} from "react";

const subscribeNever = () => () => {};

// True while rendering to a string with react-dom/server.
export const useIsStaticRender = (): boolean =>
    useSyncExternalStore(
        subscribeNever,
        () => false,
        () => true,
    );

/**
 * Ref that mounts a fresh copy from `resource` as the only child of the host
 * element. React renders no children into the host, so the copy is left alone
 * on updates; detaching the ref empties the host.
 */
export function useMountedMarkup<T extends Element>(
    resource: () => Node,
): RefCallback<T> {
    const hostRef = useRef<T | null>(null);
    return useCallback(
        (host: T | null) => {
            hostRef.current?.replaceChildren();
            hostRef.current = host;
            host?.replaceChildren(resource());
        },
        [resource],
    );
}
