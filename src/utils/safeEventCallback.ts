/**
 * Wraps a callback so that a thrown error or a rejected promise is passed to `onError` instead of propagating.
 * Returns a no-op function when there's no callback.
 */
export function safeEventCallback<const Params extends unknown[]>(
    callback: undefined | ((...args: Params) => void) | ((...args: Params) => Promise<void>) |
        ((...args: Params) => void | Promise<void>),
    onError: (error: unknown) => void
): ((...args: Params) => void) {
    if (callback == null)
        return () => {};

    return (...args: Params) => {
        try {
            const res = callback(...args);

            if (res instanceof Promise)
                res.catch(onError);
        } catch (error) {
            onError(error);
        }
    };
}
