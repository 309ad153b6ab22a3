import { invalidState, SmtpError } from "../lib/errors";
import { byteLength, LINE_TERMINATOR_OVERHEAD, SmtpLimits } from "../lib/limits";
import { Email } from "./email";

export enum SmtpState {
    /** Waiting for HELO */
    Initial = "Initial",
    GreetingReceived = "GreetingReceived",
    MailReceived = "MailReceived",
    /** At least one recipient accepted */
    RecipientsReceived = "RecipientsReceived",
    DataMode = "DataMode",
}

export const SMTP_VERBS = ["HELO", "EHLO", "MAIL", "RCPT", "DATA", "RSET", "NOOP", "QUIT"] as const;

export type SmtpVerb = typeof SMTP_VERBS[number];

export function isSmtpVerb(value: string): value is SmtpVerb {
    return (SMTP_VERBS as readonly string[]).includes(value);
}

export function canExecute(state: SmtpState, verb: SmtpVerb): boolean {
    switch (verb) {
        case "HELO":
        case "EHLO":
        case "NOOP":
        case "QUIT":
            return true;
        case "MAIL":
            return state === SmtpState.GreetingReceived;
        case "RCPT":
            return state === SmtpState.MailReceived || state === SmtpState.RecipientsReceived;
        case "DATA":
            return state === SmtpState.RecipientsReceived;
        case "RSET":
            return state !== SmtpState.Initial;
    }
}

/**
 * Transaction state of one connection. Mutators validate first and change nothing when they return an error.
 */
export class SmtpSession {
    private _state: SmtpState = SmtpState.Initial;
    private _clientDomain?: string;
    private _sender?: string;
    private _recipients: string[] = [];
    private _dataLines: string[] = [];
    private _dataSize: number = 0;
    private _inDataMode: boolean = false;

    public get state(): SmtpState {
        return this._state;
    }

    public get clientDomain(): string | undefined {
        return this._clientDomain;
    }

    public get sender(): string | undefined {
        return this._sender;
    }

    public get recipients(): readonly string[] {
        return this._recipients;
    }

    public get dataLines(): readonly string[] {
        return this._dataLines;
    }

    public get dataSize(): number {
        return this._dataSize;
    }

    public get inDataMode(): boolean {
        return this._inDataMode;
    }

    public get recipientCount(): number {
        return this._recipients.length;
    }

    public get hasCompleteTransaction(): boolean {
        return this._sender !== undefined && this._recipients.length > 0 && this._state === SmtpState.RecipientsReceived;
    }

    public canExecute(verb: SmtpVerb): boolean {
        return canExecute(this._state, verb);
    }

    /** Clears the transaction, keeps the HELO domain */
    public reset(): void {
        this._state = SmtpState.GreetingReceived;
        this._sender = undefined;
        this._recipients = [];
        this._dataLines = [];
        this._dataSize = 0;
        this._inDataMode = false;
    }

    public fullReset(): void {
        this.reset();
        this._clientDomain = undefined;
        this._state = SmtpState.Initial;
    }

    public setClientDomain(domain: string): SmtpError | null {
        if (byteLength(domain) > SmtpLimits.DOMAIN_MAX_LENGTH) {
            return { kind: "domainTooLong", max: SmtpLimits.DOMAIN_MAX_LENGTH };
        }

        this._clientDomain = domain;
        this.reset();
        return null;
    }

    public setSender(sender: string): SmtpError | null {
        if (!this.canExecute("MAIL")) {
            return invalidState("MAIL command requires HELO first");
        }
        if (byteLength(sender) > SmtpLimits.PATH_MAX_LENGTH) {
            return { kind: "pathTooLong", max: SmtpLimits.PATH_MAX_LENGTH };
        }

        this._sender = sender;
        this._recipients = [];
        this._dataLines = [];
        this._dataSize = 0;
        this._state = SmtpState.MailReceived;
        return null;
    }

    public addRecipient(recipient: string): SmtpError | null {
        if (!this.canExecute("RCPT")) {
            return invalidState("RCPT command requires MAIL first");
        }
        if (byteLength(recipient) > SmtpLimits.PATH_MAX_LENGTH) {
            return { kind: "pathTooLong", max: SmtpLimits.PATH_MAX_LENGTH };
        }
        if (this._recipients.length >= SmtpLimits.MAX_RECIPIENTS) {
            return { kind: "tooManyRecipients", max: SmtpLimits.MAX_RECIPIENTS };
        }

        this._recipients.push(recipient);
        this._state = SmtpState.RecipientsReceived;
        return null;
    }

    public startDataMode(): SmtpError | null {
        if (this._state !== SmtpState.RecipientsReceived) {
            return invalidState("DATA command requires RCPT first");
        }

        this._inDataMode = true;
        this._dataLines = [];
        this._dataSize = 0;
        this._state = SmtpState.DataMode;
        return null;
    }

    public addDataLine(line: string): SmtpError | null {
        if (!this._inDataMode) {
            return invalidState("Not in data collection mode");
        }

        const lineSize = byteLength(line) + LINE_TERMINATOR_OVERHEAD;
        if (lineSize > SmtpLimits.TEXT_LINE_MAX_LENGTH) {
            return { kind: "lineTooLong", max: SmtpLimits.TEXT_LINE_MAX_LENGTH };
        }
        if (this._dataSize + lineSize > SmtpLimits.MAX_DATA_SIZE) {
            return { kind: "tooMuchData", max: SmtpLimits.MAX_DATA_SIZE };
        }

        this._dataLines.push(line);
        this._dataSize += lineSize;
        return null;
    }

    /**
     * Ends the data phase. The session keeps nothing of the finished transaction.
     */
    public finishDataCollection(): { email: Email, error?: undefined } | { email?: undefined, error: SmtpError } {
        if (!this._inDataMode) {
            return { error: invalidState("Not in data collection mode") };
        }
        if (this._sender === undefined) {
            return { error: invalidState("No sender specified") };
        }
        if (this._recipients.length === 0) {
            return { error: invalidState("No recipients specified") };
        }

        const email = new Email(this._sender, this._recipients, this._dataLines.join("\n"));
        this.reset();
        return { email };
    }
}
