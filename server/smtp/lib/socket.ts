import { Socket } from 'net';
import { CancellablePromise, sleep } from "../../lib/sleep";
import { withResolvers } from "./resolvers";

const DESTROY_TIMEOUT_MS = 30000;

/**
 * Closes the socket after pending writes are flushed, or right away with `forceDestroy`.
 */
export async function tryCloseSocket(socket: Socket | null, forceDestroy?: boolean) {
    if (socket && !socket.closed) {
        const { promise: closedPromise, resolve } = withResolvers<void>();

        let timeoutPromise: CancellablePromise<void> | undefined;

        const onClose = () => {
            timeoutPromise?.cancel();
            resolve();
        }

        socket
            .once('close', onClose);

        // Now lead to close event
        if (!socket.destroyed) {
            if (!forceDestroy) {
                timeoutPromise = sleep(DESTROY_TIMEOUT_MS, () => {
                    if (!socket.destroyed) {
                        socket.destroy();
                    }
                });
                socket.destroySoon();
            } else {
                socket.destroy();
            }
        }

        await closedPromise;
    }
}
