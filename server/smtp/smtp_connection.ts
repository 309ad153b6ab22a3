import { AddressInfo, Socket } from "node:net";
import { TcpClientConnection } from "./connection/tcp_client_connection";
import { SmtpParser } from "./protocol/smtp_parser";
import { SmtpProtocol, SmtpProtocolOptions, SmtpStep } from "./protocol/smtp_protocol";
import { SmtpIdleTimer } from "./protocol/smtp_timer";
import { SmtpResponse } from "./protocol/smtp_response";
import { EmailSink } from "./lib/email_queue";
import { SmtpLimits } from "./lib/limits";
import { Waitable } from "./lib/waitable";
import { ConnectionClosedException, TimeoutException } from "./lib/exceptions";

export type SmtpTimeouts = {
    /** Idle time allowed between two client lines, zero disables the timeout */
    clientMs: number,
};

export type SmtpConnectionOptions = SmtpProtocolOptions & {
    timeouts: SmtpTimeouts,
};

/**
 * Drives one client: sends the greeting, then reads lines and writes replies until QUIT, end of stream, socket error
 * or idle timeout.
 */
export class SmtpConnection {
    private readonly client: TcpClientConnection;
    private readonly parser: SmtpParser;
    private readonly protocol: SmtpProtocol;
    private readonly timer: SmtpIdleTimer;

    private readonly closed = new Waitable<null>(null);

    constructor(socket: Socket, options: SmtpConnectionOptions, sink: EmailSink) {
        this.client = new TcpClientConnection(socket);
        this.client
            .on("close", () => this.handleClientClose())
            .on("error", (err) => this.handleClientError(err));

        this.parser = new SmtpParser(this.client.read.bind(this.client));
        this.protocol = new SmtpProtocol(options, sink);

        this.timer = new SmtpIdleTimer(options.timeouts.clientMs);
        this.timer.once("timeout", () => this.handleClientTimeout());
    }

    public get remoteAddress(): AddressInfo {
        return this.client.remoteAddress;
    }

    public async loop(): Promise<void> {
        try {
            this.writeResponse(this.protocol.greeting());
            await this.clientLoop();
            await this.close();
        } catch (err) {
            await this.close(err);
            throw err;
        }

        // Forward any originally stored exception
        await this.closed.promise;
    }

    private async clientLoop() {
        while (!this.closed.done) {
            const maxLength = this.protocol.inDataMode
                ? SmtpLimits.TEXT_LINE_MAX_LENGTH
                : SmtpLimits.COMMAND_LINE_MAX_LENGTH;

            this.timer.restart();
            const result = await Promise.race([this.parser.readLine(maxLength), this.closed.promise]);
            this.timer.stop();

            if (result === null) {
                break;
            }

            const { line, error } = result;
            let step: SmtpStep;
            if (error) {
                step = this.protocol.lineError(error);
            } else if (line === null) {
                if (this.protocol.inDataMode) {
                    throw new ConnectionClosedException("Connection closed during mail data");
                }
                // Client finished sending
                break;
            } else {
                step = this.protocol.clientRequest(line);
            }

            if (step.response) {
                this.writeResponse(step.response);
            }
            if (step.close) {
                this.client.end();
                break;
            }
        }
    }

    private writeResponse(response: SmtpResponse) {
        this.client.write(response.toWire(SmtpLimits.REPLY_LINE_MAX_LENGTH));
    }

    public async close(err?: unknown): Promise<void> {
        if (!this.closed.done) {
            this.closed.set(err);
            this.timer.close();
            await this.client.close(err);
        }
    }

    private handleClientClose() {
        this.closed.set();
        this.timer.close();
    }

    private handleClientError(err: Error) {
        this.closed.set(err);
        this.timer.close();
    }

    private handleClientTimeout() {
        this.close(new TimeoutException("Client idle timeout")).catch((err) => {
            console.error("Error closing idle connection", this.remoteAddress, err);
        });
    }
}
