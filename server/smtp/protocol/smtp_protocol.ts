import { SmtpError } from "../lib/errors";
import { EmailSink } from "../lib/email_queue";
import { SmtpCommandHandler } from "./smtp_commands";
import { SmtpResponse } from "./smtp_response";
import { SmtpSession } from "./smtp_session";

export const END_OF_DATA = ".";

export interface SmtpProtocolOptions {
    hostname: string;
    greeting: string;
    ehlo: boolean;
}

/**
 * Outcome of one received line. There is no response for data lines in the middle of the data phase.
 */
export interface SmtpStep {
    response: SmtpResponse | null;
    close: boolean;
}

/**
 * Routes client lines either to the command handler or to the data collector, and hands finished mails to the sink.
 * Command errors leave the session untouched, data errors abort the transaction.
 */
export class SmtpProtocol {
    private readonly options: SmtpProtocolOptions;
    private readonly commands: SmtpCommandHandler;
    private readonly sink: EmailSink;
    private readonly _session: SmtpSession;

    constructor(options: SmtpProtocolOptions, sink: EmailSink, session: SmtpSession = new SmtpSession()) {
        this.options = options;
        this.commands = new SmtpCommandHandler(options.hostname, { ehlo: options.ehlo });
        this.sink = sink;
        this._session = session;
    }

    public get session(): SmtpSession {
        return this._session;
    }

    public get inDataMode(): boolean {
        return this._session.inDataMode;
    }

    public greeting(): SmtpResponse {
        return SmtpResponse.greeting(this.options.greeting);
    }

    public clientRequest(line: string): SmtpStep {
        if (this._session.inDataMode) {
            return this.dataLine(line);
        }

        const { response, close, error } = this.commands.processCommand(line, this._session);
        if (error) {
            return { response: SmtpResponse.error(error), close: false };
        }
        return { response, close };
    }

    /**
     * Reports a line that could not be framed, e.g. one that exceeded the line limit on the wire.
     */
    public lineError(error: SmtpError): SmtpStep {
        if (this._session.inDataMode) {
            return this.abortData(error);
        }
        return { response: SmtpResponse.error(error), close: false };
    }

    private dataLine(line: string): SmtpStep {
        if (line === END_OF_DATA) {
            const { email, error } = this._session.finishDataCollection();
            if (error) {
                return this.abortData(error);
            }
            // Nobody listening is not an error of the transaction
            this.sink.send(email);
            return { response: SmtpResponse.ok(), close: false };
        }

        const error = this._session.addDataLine(line);
        if (error) {
            return this.abortData(error);
        }
        return { response: null, close: false };
    }

    private abortData(error: SmtpError): SmtpStep {
        this._session.reset();
        return { response: SmtpResponse.error(error), close: false };
    }
}
