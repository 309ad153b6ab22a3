import { Socket } from 'net';
import { AddressInfo } from "node:net";
import { tryCloseSocket } from '../lib/socket';
import libRead from "../lib/read";
import { TypedEmitter } from "tiny-typed-emitter";
import { Waitable } from "../lib/waitable";

interface TcpClientConnectionEvents {
    "close": () => void;
    "error": (err: Error) => void;
}

/**
 * Accepted client socket. Reading resolves with null once the client has
 * finished sending.
 */
export class TcpClientConnection extends TypedEmitter<TcpClientConnectionEvents> {
    private socket: Socket | null = null;
    private readonly _remoteAddress: AddressInfo;

    private readonly closed = new Waitable<null>(null);

    constructor(socket: Socket) {
        super();

        this.socket = socket;
        // Replies are still written after the client has half-closed its side
        this.socket.allowHalfOpen = true;
        this._remoteAddress = {
            address: socket.remoteAddress ?? "unknown",
            port: socket.remotePort ?? 0,
            family: socket.remoteFamily ?? "unknown",
        };

        this.registerListeners(this.socket);
    }

    public get remoteAddress(): AddressInfo {
        return this._remoteAddress;
    }

    public end() {
        this.socket?.end();
    }

    private registerListeners(socket: Socket) {
        socket
            .on('close', () => this.handleClose())
            .on('error', (err: Error) => this.handleError(err));
    }

    public async read(): Promise<Buffer | null> {
        return await libRead(this.socket, this.closed.promise);
    }

    private handleClose() {
        this.socket = null;
        this.closed.set();
        process.nextTick(() => this.emit("close"));
    }

    private handleError(err: Error) {
        this.closed.set(err);
        process.nextTick(() => this.emit("error", err));
    }

    public write(data: Buffer | string): void {
        if (!this.socket || this.socket.destroyed || this.socket.writableEnded) {
            return;
        }
        if (Buffer.isBuffer(data)) {
            this.socket.write(data);
        } else {
            this.socket.write(data, "utf-8");
        }
    }

    public async close(err?: unknown): Promise<void> {
        await tryCloseSocket(this.socket, err !== undefined);
    }
}
