import { describe, expect, jest, test } from "@jest/globals";
import { SmtpIdleTimer } from "./smtp_timer";
import { sleep } from "../../lib/sleep";

describe("Test idle timer", () => {
    test("Check timeout is emitted", async () => {
        const timer = new SmtpIdleTimer(20);
        const onTimeout = jest.fn();
        timer.on("timeout", onTimeout);

        timer.restart();
        await sleep(100);
        expect(onTimeout).toHaveBeenCalledTimes(1);
    });

    test("Check stopped timer stays quiet", async () => {
        const timer = new SmtpIdleTimer(20);
        const onTimeout = jest.fn();
        timer.on("timeout", onTimeout);

        timer.restart();
        timer.stop();
        await sleep(100);
        expect(onTimeout).not.toHaveBeenCalled();
    });

    test("Check restart postpones the timeout", async () => {
        const timer = new SmtpIdleTimer(200);
        const onTimeout = jest.fn();
        timer.on("timeout", onTimeout);

        timer.restart();
        await sleep(120);
        timer.restart();
        await sleep(120);
        expect(onTimeout).not.toHaveBeenCalled();
        timer.close();
    });

    test("Check zero timeout and closed timer", async () => {
        const disabled = new SmtpIdleTimer(0);
        const closed = new SmtpIdleTimer(20);
        const onTimeout = jest.fn();
        disabled.on("timeout", onTimeout);
        closed.on("timeout", onTimeout);

        disabled.restart();
        closed.close();
        closed.restart();
        await sleep(100);
        expect(onTimeout).not.toHaveBeenCalled();
    });
});
