import { Socket } from "net";
import { withResolvers } from "./resolvers";

function readChunk(socket: Socket): Buffer | null {
    const data: unknown = socket.read();
    if (Buffer.isBuffer(data)) {
        return data;
    }
    if (typeof data === "string") {
        return Buffer.from(data, "utf-8");
    }
    return null;
}

/**
 * Reads whatever the socket has buffered, waiting for more when empty. Resolves with null at the end of the stream.
 */
export default async function read(socket: Socket | null, closedPromise: Promise<null>): Promise<Buffer | null> {
    while (socket) {
        if (socket.closed) {
            return closedPromise;
        }
        if (socket.readableEnded) {
            return null;
        }

        const data = readChunk(socket);
        if (data) {
            return data;
        }

        const { promise: readablePromise, resolve } = withResolvers<boolean>();

        const onReadable = () => {
            resolve(true);
        }
        const onEnd = () => {
            resolve(false);
        }

        // We do not need to handle close event, it is handled by closedPromise
        socket
            .once('readable', onReadable)
            .once('end', onEnd);

        try {
            const readable = await Promise.race([readablePromise, closedPromise]);
            // Either the end of the stream or a clean close
            if (!readable) {
                return null;
            }
        } finally {
            socket
                .off('readable', onReadable)
                .off('end', onEnd);
        }
    }
    return closedPromise;
}
