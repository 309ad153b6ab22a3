import { TypedEmitter } from "tiny-typed-emitter";

interface SmtpIdleTimerEvents {
    "timeout": () => void;
}

/**
 * Client inactivity timer. A timeout of zero disables it.
 */
export class SmtpIdleTimer extends TypedEmitter<SmtpIdleTimerEvents> {
    private readonly timeoutMs: number;
    private timeoutId: NodeJS.Timeout | null = null;
    private closed: boolean = false;

    constructor(timeoutMs: number) {
        super();

        this.timeoutMs = timeoutMs;
    }

    public restart() {
        this.stop();
        if (this.closed || this.timeoutMs <= 0) {
            return;
        }
        this.timeoutId = setTimeout(() => {
            this.timeoutId = null;
            process.nextTick(() => this.emit("timeout"));
        }, this.timeoutMs);
    }

    public stop() {
        if (this.timeoutId !== null) {
            clearTimeout(this.timeoutId);
            this.timeoutId = null;
        }
    }

    public close() {
        this.closed = true;
        this.stop();
    }
}
