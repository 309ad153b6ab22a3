import { byteLength } from "../lib/limits";

const SUBJECT_PREFIXES = ["Subject: ", "subject: "];

/**
 * Message accepted by a completed mail transaction. The body is the received text lines joined by `\n`.
 */
export class Email {
    public readonly from: string;
    public readonly to: readonly string[];
    public readonly data: string;
    public readonly receivedAt: Date;

    constructor(from: string, to: readonly string[], data: string, receivedAt: Date = new Date()) {
        this.from = from;
        this.to = Object.freeze([...to]);
        this.data = data;
        this.receivedAt = receivedAt;
        Object.freeze(this);
    }

    public hasRecipient(recipient: string): boolean {
        return this.to.includes(recipient);
    }

    public isFromSender(sender: string): boolean {
        return this.from === sender;
    }

    public get dataSize(): number {
        return byteLength(this.data);
    }

    /** Value of the Subject header, looked up in the header block only */
    public get subject(): string | null {
        for (const line of this.lines()) {
            if (line === "") {
                break;
            }
            const prefix = SUBJECT_PREFIXES.find((value) => line.startsWith(value));
            if (prefix) {
                return line.substring(prefix.length);
            }
        }
        return null;
    }

    /** Text after the first empty line */
    public get body(): string | null {
        let offset = 0;
        for (const rawLine of this.data.split("\n")) {
            offset += rawLine.length + 1;
            if (stripCarriageReturn(rawLine) === "") {
                return offset < this.data.length ? this.data.substring(offset) : null;
            }
        }
        return null;
    }

    public containsText(text: string): boolean {
        return this.data.includes(text);
    }

    private lines(): string[] {
        return this.data.split("\n").map(stripCarriageReturn);
    }
}

function stripCarriageReturn(line: string): string {
    return line.endsWith("\r") ? line.substring(0, line.length - 1) : line;
}
