import { SmtpError } from "../lib/errors";

export const LF = 0x0a;
export const CR = 0x0d;

export type LineResult =
    | { line: string | null, error?: undefined }
    | { line?: undefined, error: SmtpError };

/**
 * Splits the client byte stream into text lines. Lines end with CRLF, a bare LF is accepted as well. Invalid UTF-8
 * sequences are replaced, not rejected.
 */
export class SmtpParser {
    private dataBuffer: Buffer = Buffer.alloc(0);
    private readonly dataProvider: () => Promise<Buffer | null>;
    private ended: boolean = false;

    constructor(dataProvider: () => Promise<Buffer | null>) {
        this.dataProvider = dataProvider;
    }

    private async moreData(): Promise<boolean> {
        if (this.ended) {
            return false;
        }

        const data = await this.dataProvider();
        if (data === null) {
            this.ended = true;
            return false;
        }

        this.dataBuffer = Buffer.concat([this.dataBuffer, data]);
        return true;
    }

    /**
     * Reads the next line without its terminator. A line longer than `maxLength` bytes is consumed up to its end and
     * reported as an error. Resolves with a null line when the stream has ended.
     */
    public async readLine(maxLength: number): Promise<LineResult> {
        let skipping = false;
        let searchOffset = 0;

        while (true) {
            const lineEnd = this.dataBuffer.indexOf(LF, searchOffset);
            if (lineEnd !== -1) {
                const contentEnd = (lineEnd > 0 && this.dataBuffer[lineEnd - 1] === CR) ? lineEnd - 1 : lineEnd;
                const content = this.dataBuffer.subarray(0, contentEnd);
                this.dataBuffer = this.dataBuffer.subarray(lineEnd + 1);

                if (skipping || content.length > maxLength) {
                    return { error: { kind: "lineTooLong", max: maxLength } };
                }
                return { line: content.toString("utf-8") };
            }

            if (this.dataBuffer.length > maxLength + 1) {
                // Keep the last byte, it may be the CR of a CRLF split between reads
                skipping = true;
                this.dataBuffer = this.dataBuffer.subarray(this.dataBuffer.length - 1);
            }
            searchOffset = this.dataBuffer.length;

            if (!await this.moreData()) {
                if (skipping || this.dataBuffer.length === 0) {
                    return { line: null };
                }
                // Unterminated last line
                const rest = this.dataBuffer;
                this.dataBuffer = Buffer.alloc(0);
                if (rest.length > maxLength) {
                    return { error: { kind: "lineTooLong", max: maxLength } };
                }
                return { line: rest.toString("utf-8") };
            }
        }
    }
}
