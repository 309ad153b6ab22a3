import { TypedEmitter } from "tiny-typed-emitter";
import { Email } from "../protocol/email";
import { Resolvers, withResolvers } from "./resolvers";
import { sleep } from "../../lib/sleep";

/**
 * Receiver of finished mails. `send` must return immediately and must not throw.
 */
export interface EmailSink {
    send(email: Email): boolean;
}

interface EmailQueueEvents {
    "email": (email: Email) => void;
    "close": () => void;
}

/**
 * In-memory channel between the SMTP connections and the code under test. Sending never blocks: when the queue is
 * closed or full, the mail is dropped and `send` returns false.
 */
export class EmailQueue extends TypedEmitter<EmailQueueEvents> implements EmailSink {
    private readonly emails: Email[] = [];
    private readonly receivers: Resolvers<Email | null>[] = [];
    private readonly capacity: number;
    private _closed: boolean = false;

    constructor(capacity?: number) {
        super();

        this.capacity = capacity ?? Number.POSITIVE_INFINITY;
    }

    public get size(): number {
        return this.emails.length;
    }

    public get closed(): boolean {
        return this._closed;
    }

    public send(email: Email): boolean {
        if (this._closed) {
            return false;
        }

        const receiver = this.receivers.shift();
        if (receiver) {
            receiver.resolve(email);
        } else if (this.emails.length >= this.capacity) {
            return false;
        } else {
            this.emails.push(email);
        }

        try {
            this.emit("email", email);
        } catch (err) {
            console.warn("Email listener failed", err);
        }
        return true;
    }

    public tryReceive(): Email | null {
        return this.emails.shift() ?? null;
    }

    /**
     * Waits for the next mail. Resolves with null on timeout, or once the queue is closed and empty.
     */
    public async receive(timeoutMs?: number): Promise<Email | null> {
        const email = this.emails.shift();
        if (email) {
            return email;
        }
        if (this._closed) {
            return null;
        }

        const receiver = withResolvers<Email | null>();
        this.receivers.push(receiver);

        if (timeoutMs === undefined) {
            return await receiver.promise;
        }

        const timeoutPromise = sleep(timeoutMs, () => {
            const index = this.receivers.indexOf(receiver);
            if (index !== -1) {
                this.receivers.splice(index, 1);
            }
            receiver.resolve(null);
        });
        try {
            return await receiver.promise;
        } finally {
            timeoutPromise.cancel();
        }
    }

    /** Removes and returns everything queued */
    public drain(): Email[] {
        return this.emails.splice(0, this.emails.length);
    }

    public close(): void {
        if (this._closed) {
            return;
        }
        this._closed = true;

        let receiver = this.receivers.shift();
        while (receiver) {
            receiver.resolve(null);
            receiver = this.receivers.shift();
        }
        this.emit("close");
    }
}
