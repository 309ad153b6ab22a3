import { AddressInfo, Server, Socket } from "node:net";
import { SmtpConnection, SmtpConnectionOptions } from "./smtp_connection";
import { EmailSink } from "./lib/email_queue";
import { ServerNotListeningException } from "./lib/exceptions";
import { withResolvers } from "./lib/resolvers";
import { Waitable } from "./lib/waitable";

export type SmtpListenOptions = {
    host?: string,
    /** Zero or undefined picks a free port */
    port?: number,
};

export class SmtpServer {
    private readonly options: SmtpConnectionOptions;
    private readonly listenOptions: SmtpListenOptions;
    private readonly sink: EmailSink;
    private readonly server: Server;
    private _localAddress: AddressInfo | null = null;

    private readonly connections: Set<SmtpConnection> = new Set<SmtpConnection>();
    private connectionsEmpty: Waitable | null = null;

    constructor(options: SmtpConnectionOptions, listenOptions: SmtpListenOptions, sink: EmailSink) {
        this.options = options;
        this.listenOptions = listenOptions;
        this.sink = sink;
        this.server = new Server();
        this.server.on("connection", (socket) => this.handleConnection(socket));
    }

    public get listening(): boolean {
        return this.server.listening;
    }

    /**
     * Bound local address, available once listening.
     */
    public get address(): AddressInfo {
        if (!this._localAddress) {
            throw new ServerNotListeningException("SMTP server is not listening");
        }
        return this._localAddress;
    }

    public get connectionCount(): number {
        return this.connections.size;
    }

    public async listen(): Promise<void> {
        await this.serverListen(this.listenOptions.port ?? 0, this.listenOptions.host);

        const address = this.server.address();
        if (address === null || typeof address === "string") {
            throw new Error(`Unexpected SMTP server address: ${ address }`);
        }
        this._localAddress = address;
    }

    private async serverListen(port: number, host?: string) {
        const { promise: listenPromise, resolve, reject } = withResolvers<void>();
        const onListening = () => {
            this.server.off("error", onError);
            resolve();
        }
        const onError = (err: Error) => {
            this.server.off("listening", onListening);
            reject(err);
        }
        this.server
            .once("listening", onListening)
            .once("error", onError);
        this.server.listen(port, ...(host ? [host] : []));
        await listenPromise;
    }

    private async closeServer() {
        if (this.server.listening) {
            const { promise: closePromise, resolve } = withResolvers<void>();
            this.server.once("close", () => process.nextTick(resolve));
            this.server.close();
            await closePromise;
        }
    }

    /**
     * Stops accepting, closes the open connections and waits for their loops to finish.
     */
    public async close() {
        const serverClosed = this.closeServer();

        if (this.connections.size > 0) {
            this.connectionsEmpty = new Waitable<void>(undefined);
            const results = await Promise.allSettled([...this.connections].map((connection) => connection.close()));
            results.forEach((result) => {
                if (result.status === "rejected") {
                    console.error("Error closing connection", result.reason);
                }
            });
            // Wait for all loops to finish
            if (this.connections.size > 0) {
                await this.connectionsEmpty.promise;
            }
        }

        try {
            await serverClosed;
        } catch (err) {
            console.error("Error closing server", err);
        }
        this._localAddress = null;
    }

    private handleConnection(socket: Socket) {
        this.onConnection(socket).catch((err) => {
            console.error("Unexpected connection failure", err);
        });
    }

    protected async onConnection(socket: Socket) {
        const address: AddressInfo = {
            address: socket.remoteAddress ?? "unknown",
            port: socket.remotePort ?? 0,
            family: socket.remoteFamily ?? "unknown",
        };

        console.log("New connection", address);
        try {
            await this.serve(socket);
            console.log("Connection closed cleanly", address);
        } catch (err) {
            console.warn("Connection closed with error", address, err);
        }
    }

    protected async serve(socket: Socket) {
        const connection = new SmtpConnection(socket, this.options, this.sink);
        this.connections.add(connection);
        try {
            await connection.loop();
        } finally {
            this.connections.delete(connection);
            if (this.connections.size === 0) {
                this.connectionsEmpty?.set();
            }
        }
    }
}

export function createServer(options: SmtpConnectionOptions, listenOptions: SmtpListenOptions, sink: EmailSink): SmtpServer {
    return new SmtpServer(options, listenOptions, sink);
}
