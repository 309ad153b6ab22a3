import { SmtpError, SmtpReply, toSmtpReply } from "../lib/errors";
import { byteLength, SmtpLimits } from "../lib/limits";

export const CRLF = "\r\n";

export const TRUNCATED_MESSAGE = "Response too long (truncated)";

export class SmtpResponse {
    public readonly code: string;
    public readonly message: string;
    /** Capability lines of an EHLO reply, rendered after the message line */
    public readonly multiline?: readonly string[];

    constructor(code: string, message: string, multiline?: readonly string[]) {
        this.code = code;
        this.message = message;
        if (multiline !== undefined) {
            this.multiline = Object.freeze([...multiline]);
        }
        Object.freeze(this);
    }

    public static ok(): SmtpResponse {
        return new SmtpResponse("250", "OK");
    }

    public static greeting(text: string): SmtpResponse {
        return new SmtpResponse("220", text);
    }

    public static helo(hostname: string, clientDomain: string): SmtpResponse {
        return new SmtpResponse("250", `${ hostname } Hello ${ clientDomain }`);
    }

    public static ehlo(hostname: string, clientDomain: string, capabilities: readonly string[]): SmtpResponse {
        return new SmtpResponse("250", `${ hostname } Hello ${ clientDomain }`, capabilities);
    }

    public static dataStart(): SmtpResponse {
        return new SmtpResponse("354", "End data with <CR><LF>.<CR><LF>");
    }

    public static quit(): SmtpResponse {
        return new SmtpResponse("221", "Bye");
    }

    public static error(error: SmtpError): SmtpResponse {
        const { code, message } = toSmtpReply(error);
        return new SmtpResponse(code, message);
    }

    public get isSuccess(): boolean {
        return this.code.startsWith("2");
    }

    public get isError(): boolean {
        return this.code.startsWith("4") || this.code.startsWith("5");
    }

    public format(): string {
        const lines = this.multiline;
        if (!lines || lines.length === 0) {
            return `${ this.code } ${ this.message }${ CRLF }`;
        }

        let result = `${ this.code }-${ this.message }${ CRLF }`;
        lines.forEach((line, index) => {
            const separator = index === lines.length - 1 ? " " : "-";
            result += `${ this.code }${ separator }${ line }${ CRLF }`;
        });
        return result;
    }

    /**
     * Serialized form that fits into a reply line. Oversized replies are replaced by a fixed message under the
     * same code.
     */
    public toWire(maxLength: number = SmtpLimits.REPLY_LINE_MAX_LENGTH): string {
        const formatted = this.format();
        if (byteLength(formatted) > maxLength) {
            return new SmtpResponse(this.code, TRUNCATED_MESSAGE).format();
        }
        return formatted;
    }
}

/**
 * Parses the code and text of a single reply line, with or without the trailing CRLF.
 */
export function parseSmtpReply(line: string): SmtpReply | null {
    const text = line.endsWith(CRLF) ? line.substring(0, line.length - CRLF.length) : line;
    const match = /^(\d{3})[ -](.*)$/s.exec(text);
    if (!match) {
        return null;
    }
    return { code: match[1], message: match[2] };
}
