import { withResolvers } from "../smtp/lib/resolvers";

export interface CancellablePromise<T> extends Promise<T> {
    cancel(): void
}

/**
 * Resolves after `ms` milliseconds, running `onTimeout` first. A cancelled sleep never settles.
 */
export function sleep(ms: number, onTimeout?: () => void): CancellablePromise<void> {
    const { promise: sleepPromise, resolve: sleepPromiseResolve, reject: sleepPromiseReject } = withResolvers<void>();
    let timeoutId: NodeJS.Timeout | undefined;

    timeoutId = setTimeout(() => {
        timeoutId = undefined;
        try {
            onTimeout?.call(null);
            sleepPromiseResolve();
        } catch (err) {
            sleepPromiseReject(err);
        }
    }, ms);

    return Object.assign(sleepPromise, {
        cancel: () => {
            if (timeoutId !== undefined) {
                clearTimeout(timeoutId);
                timeoutId = undefined;
            }
        }
    });
}
