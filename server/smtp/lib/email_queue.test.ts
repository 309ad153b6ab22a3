import { describe, expect, jest, test } from "@jest/globals";
import { EmailQueue } from "./email_queue";
import { Email } from "../protocol/email";

function createEmail(index: number) {
    return new Email(`sender${ index }@example.test`, ["rcpt@example.test"], `Subject: Mail ${ index }`);
}

describe("Test email queue", () => {
    test("Check emails are received in order", () => {
        const queue = new EmailQueue();
        expect(queue.send(createEmail(1))).toBe(true);
        expect(queue.send(createEmail(2))).toBe(true);
        expect(queue.size).toEqual(2);
        expect(queue.tryReceive()?.from).toEqual("sender1@example.test");
        expect(queue.tryReceive()?.from).toEqual("sender2@example.test");
        expect(queue.tryReceive()).toBeNull();
    });

    test("Check waiting receiver gets the email", async () => {
        const queue = new EmailQueue();
        const received = queue.receive();
        queue.send(createEmail(1));
        expect((await received)?.from).toEqual("sender1@example.test");
        expect(queue.size).toEqual(0);
    });

    test("Check queued email is returned right away", async () => {
        const queue = new EmailQueue();
        queue.send(createEmail(1));
        expect((await queue.receive(10))?.from).toEqual("sender1@example.test");
    });

    test("Check receive timeout", async () => {
        const queue = new EmailQueue();
        expect(await queue.receive(10)).toBeNull();

        // Timed out receiver does not swallow later emails
        queue.send(createEmail(1));
        expect(queue.size).toEqual(1);
    });

    test("Check capacity", () => {
        const queue = new EmailQueue(1);
        expect(queue.send(createEmail(1))).toBe(true);
        expect(queue.send(createEmail(2))).toBe(false);
        expect(queue.drain().map((email) => email.from)).toEqual(["sender1@example.test"]);
        expect(queue.send(createEmail(3))).toBe(true);
    });

    test("Check drain", () => {
        const queue = new EmailQueue();
        queue.send(createEmail(1));
        queue.send(createEmail(2));
        expect(queue.drain().map((email) => email.from)).toEqual(["sender1@example.test", "sender2@example.test"]);
        expect(queue.size).toEqual(0);
        expect(queue.drain()).toEqual([]);
    });

    test("Check close", async () => {
        const queue = new EmailQueue();
        const onClose = jest.fn();
        queue.on("close", onClose);

        queue.send(createEmail(1));
        const waiting = new EmailQueue();
        const received = waiting.receive();
        waiting.close();
        expect(await received).toBeNull();

        queue.close();
        queue.close();
        expect(onClose).toHaveBeenCalledTimes(1);
        expect(queue.closed).toBe(true);
        expect(queue.send(createEmail(2))).toBe(false);

        // Already queued emails stay available
        expect((await queue.receive())?.from).toEqual("sender1@example.test");
        expect(await queue.receive()).toBeNull();
    });

    test("Check email event", () => {
        const queue = new EmailQueue();
        const onEmail = jest.fn();
        queue.on("email", onEmail);
        const email = createEmail(1);
        queue.send(email);
        expect(onEmail).toHaveBeenCalledWith(email);
    });

    test("Check failing listener does not fail sending", () => {
        const warn = jest.spyOn(console, "warn").mockImplementation(() => {});
        try {
            const queue = new EmailQueue();
            queue.on("email", () => {
                throw new Error("listener failure");
            });
            expect(queue.send(createEmail(1))).toBe(true);
            expect(queue.size).toEqual(1);
            expect(warn).toHaveBeenCalledTimes(1);
        } finally {
            warn.mockRestore();
        }
    });
});
