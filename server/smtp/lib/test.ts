import { connect, Socket } from "net";
import { expect } from "@jest/globals";
import { sleep } from "../../lib/sleep";
import { tryCloseSocket } from "./socket";
import { Resolvers, withResolvers } from "./resolvers";
import { SmtpServer } from "../smtp_server";
import { Waitable } from "./waitable";

const EXPECT_TIMEOUT_MS = 5000;

/**
 * Server that reports how its connections ended instead of only logging it.
 */
export class SpySmtpServer extends SmtpServer {
    private readonly ended = new Waitable<boolean>(true);

    protected async onConnection(socket: Socket): Promise<void> {
        try {
            await this.serve(socket);
            this.ended.set();
        } catch (err) {
            console.info(`SMTP test server: connection closed with error: ${ err instanceof Error ? err.message : String(err) }`);
            this.ended.set(err);
        }
    }

    public async expectEnd() {
        await expect(this.ended.promise).resolves.toBe(true);
    }

    public async expectError(message?: string) {
        if (message !== undefined) {
            await expect(this.ended.promise).rejects.toThrow(message);
        } else {
            await expect(this.ended.promise).rejects.toThrow();
        }
    }
}

/**
 * Raw TCP client. Received bytes are buffered, so `expect` may be called after the server has already answered.
 */
export class MockClient {
    private socket: Socket | null = null;
    private error: Error | null = null;
    private buffer: Buffer = Buffer.alloc(0);
    private ended: boolean = false;
    private changed: Resolvers<void> | null = null;

    constructor(private readonly host: string, private readonly port: number) {
    }

    public checkError() {
        if (this.error) {
            throw this.error;
        }
    }

    private connected(): Socket {
        if (!this.socket) {
            throw new Error("Mock client is not connected");
        }
        return this.socket;
    }

    public async connect() {
        const { promise: connectPromise, resolve, reject } = withResolvers<void>();
        const socket = connect({ host: this.host, port: this.port }, resolve);
        this.socket = socket;
        socket.once("error", reject);
        try {
            await connectPromise;
        } finally {
            socket.off("error", reject);
        }

        socket
            .on("data", (chunk: Buffer) => {
                this.buffer = Buffer.concat([this.buffer, chunk]);
                this.changed?.resolve();
            })
            .on("end", () => this.handleEnd())
            .on("close", () => this.handleEnd())
            .on("error", (err) => {
                this.error = err;
                this.handleEnd();
            });
        return this;
    }

    private handleEnd() {
        this.ended = true;
        this.changed?.resolve();
    }

    public async close() {
        if (this.socket) {
            await tryCloseSocket(this.socket);
        }
    }

    public end(): void {
        this.socket?.end();
    }

    public async send(data: string | Buffer) {
        this.checkError();
        const socket = this.connected();
        if (Buffer.isBuffer(data)) {
            socket.write(data);
        } else {
            socket.write(data, "binary");
        }
        return this;
    }

    private async waitFor(predicate: () => boolean): Promise<boolean> {
        const deadline = Date.now() + EXPECT_TIMEOUT_MS;
        while (!predicate()) {
            const remaining = deadline - Date.now();
            if (this.ended || remaining <= 0) {
                return false;
            }

            const changed = withResolvers<void>();
            this.changed = changed;
            const timeoutPromise = sleep(remaining);
            try {
                await Promise.race([changed.promise, timeoutPromise]);
            } finally {
                timeoutPromise.cancel();
                this.changed = null;
            }
        }
        return true;
    }

    /**
     * Consumes exactly the expected bytes from what the server has sent.
     */
    public async expect(data: string) {
        const length = Buffer.byteLength(data, "binary");
        await this.waitFor(() => this.buffer.length >= length);

        const received = this.buffer.subarray(0, length).toString("binary");
        this.buffer = this.buffer.subarray(received.length);
        expect(received).toEqual(data);
        return this;
    }

    public async expectClosed() {
        await this.waitFor(() => this.ended);
        expect(this.ended).toBe(true);
        return this;
    }
}
