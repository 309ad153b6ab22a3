// noinspection DuplicatedCode,SpellCheckingInspection

import { afterEach, describe, expect, test } from "@jest/globals";
import { MockClient, SpySmtpServer } from "./lib/test";
import { EmailQueue } from "./lib/email_queue";

type MockOptions = {
    ehlo?: boolean,
    clientTimeoutMs?: number,
};

let queue: EmailQueue;
let mockClient: MockClient;
let smtpServer: SpySmtpServer;

async function createMocks(options: MockOptions = {}) {
    queue = new EmailQueue();
    smtpServer = new SpySmtpServer(
        {
            hostname: "mx.test",
            greeting: "Welcome to smtp-testbed",
            ehlo: options.ehlo ?? true,
            timeouts: { clientMs: options.clientTimeoutMs ?? 30000 },
        },
        { host: "127.0.0.1", port: 0 },
        queue,
    );
    await smtpServer.listen();

    mockClient = new MockClient("127.0.0.1", smtpServer.address.port);
    await mockClient.connect();
    await mockClient.expect("220 Welcome to smtp-testbed\r\n");
}

async function startData() {
    await mockClient.send("HELO client.test\r\nMAIL FROM:<sender@example.test>\r\nRCPT TO:<rcpt@example.test>\r\nDATA\r\n");
    await mockClient.expect(
        "250 mx.test Hello client.test\r\n" +
        "250 OK\r\n" +
        "250 OK\r\n" +
        "354 End data with <CR><LF>.<CR><LF>\r\n");
}

afterEach(async () => {
    await Promise.all([
        mockClient.close(),
        smtpServer.close(),
    ]);
    queue.close();
});

describe("Test connect and disconnect handling", () => {
    test("Check address is only known while listening", async () => {
        await createMocks();
        expect(smtpServer.listening).toBe(true);
        expect(smtpServer.address.address).toEqual("127.0.0.1");

        await smtpServer.close();
        expect(smtpServer.listening).toBe(false);
        expect(() => smtpServer.address).toThrow("SMTP server is not listening");
    });

    test("Check clean shutdown with QUIT command", async () => {
        await createMocks();

        await mockClient.send("QUIT\r\n");
        await mockClient.expect("221 Bye\r\n");
        await mockClient.expectClosed();
        await smtpServer.expectEnd();
    });

    test("Check clean shutdown with client disconnection", async () => {
        await createMocks();

        mockClient.end();
        await smtpServer.expectEnd();
        await mockClient.expectClosed();
    });

    test("Check client disconnection during mail data", async () => {
        await createMocks();
        await startData();

        await mockClient.send("Subject: Unfinished\r\n");
        mockClient.end();
        await smtpServer.expectError("Connection closed during mail data");
        expect(queue.size).toEqual(0);
    });

    test("Check idle client is disconnected", async () => {
        await createMocks({ clientTimeoutMs: 200 });

        await smtpServer.expectError("Client idle timeout");
        await mockClient.expectClosed();
    });

    test("Check server close disconnects clients", async () => {
        await createMocks();

        await smtpServer.close();
        await smtpServer.expectEnd();
        await mockClient.expectClosed();
        expect(smtpServer.connectionCount).toEqual(0);
    });

    test("Check server serves each client once after listening again", async () => {
        await createMocks();
        await smtpServer.close();
        await mockClient.expectClosed();

        await smtpServer.listen();
        mockClient = new MockClient("127.0.0.1", smtpServer.address.port);
        await mockClient.connect();
        await mockClient.expect("220 Welcome to smtp-testbed\r\n");
        await mockClient.send("QUIT\r\n");
        await mockClient.expect("221 Bye\r\n");
        await mockClient.expectClosed();
        expect(smtpServer.connectionCount).toEqual(0);
    });
});

describe("Test mail transactions", () => {
    test("Check pipelined transaction", async () => {
        await createMocks();

        await mockClient.send(
            "HELO client.test\r\n" +
            "MAIL FROM:<sender@example.test>\r\n" +
            "RCPT TO:<rcpt@example.test>\r\n" +
            "DATA\r\n" +
            "Subject: Hi\r\n" +
            "\r\n" +
            "Hello\r\n" +
            ".\r\n" +
            "QUIT\r\n");
        await mockClient.expect(
            "250 mx.test Hello client.test\r\n" +
            "250 OK\r\n" +
            "250 OK\r\n" +
            "354 End data with <CR><LF>.<CR><LF>\r\n" +
            "250 OK\r\n" +
            "221 Bye\r\n");
        await smtpServer.expectEnd();

        const email = await queue.receive(1000);
        expect(email?.from).toEqual("sender@example.test");
        expect(email?.to).toEqual(["rcpt@example.test"]);
        expect(email?.data).toEqual("Subject: Hi\n\nHello");
        expect(email?.subject).toEqual("Hi");
    });

    test("Check line by line transaction with several recipients", async () => {
        await createMocks();

        await mockClient.send("EHLO client.test\r\n");
        await mockClient.expect("250-mx.test Hello client.test\r\n250-PIPELINING\r\n250 SIZE 10240000\r\n");
        await mockClient.send("MAIL FROM:<sender@example.test>\r\n");
        await mockClient.expect("250 OK\r\n");
        await mockClient.send("RCPT TO:<one@example.test>\r\n");
        await mockClient.expect("250 OK\r\n");
        await mockClient.send("RCPT TO:<two@example.test>\r\n");
        await mockClient.expect("250 OK\r\n");
        await mockClient.send("DATA\r\n");
        await mockClient.expect("354 End data with <CR><LF>.<CR><LF>\r\n");
        await mockClient.send("first\r\nsec");
        await mockClient.send("ond\r\n.\r\n");
        await mockClient.expect("250 OK\r\n");

        const email = await queue.receive(1000);
        expect(email?.to).toEqual(["one@example.test", "two@example.test"]);
        expect(email?.data).toEqual("first\nsecond");
    });

    test("Check RSET discards the transaction", async () => {
        await createMocks();

        await mockClient.send("HELO client.test\r\nMAIL FROM:<first@example.test>\r\nRCPT TO:<one@example.test>\r\nRSET\r\n");
        await mockClient.expect("250 mx.test Hello client.test\r\n250 OK\r\n250 OK\r\n250 OK\r\n");
        await mockClient.send("MAIL FROM:<second@example.test>\r\nRCPT TO:<two@example.test>\r\nDATA\r\nbody\r\n.\r\n");
        await mockClient.expect("250 OK\r\n250 OK\r\n354 End data with <CR><LF>.<CR><LF>\r\n250 OK\r\n");

        const email = await queue.receive(1000);
        expect(email?.from).toEqual("second@example.test");
        expect(email?.to).toEqual(["two@example.test"]);
        expect(queue.size).toEqual(0);
    });
});

describe("Test error replies", () => {
    test("Check bad sequence of commands", async () => {
        await createMocks();

        await mockClient.send("MAIL FROM:<sender@example.test>\r\nDATA\r\nFOO\r\n\r\n");
        await mockClient.expect(
            "503 Bad sequence of commands: MAIL command requires HELO first\r\n" +
            "503 Bad sequence of commands: DATA command requires RCPT first\r\n" +
            "500 Syntax error, command unrecognized\r\n" +
            "500 Syntax error, command unrecognized\r\n");
    });

    test("Check disabled EHLO", async () => {
        await createMocks({ ehlo: false });

        await mockClient.send("EHLO client.test\r\nHELO client.test\r\n");
        await mockClient.expect("500 Syntax error, command unrecognized\r\n250 mx.test Hello client.test\r\n");
    });

    test("Check command line too long", async () => {
        await createMocks();

        await mockClient.send(`NOOP ${ "a".repeat(600) }\r\nNOOP\r\n`);
        await mockClient.expect("500 Line too long (max 512 characters)\r\n250 OK\r\n");
    });

    test("Check data line too long aborts the transaction", async () => {
        await createMocks();
        await startData();

        await mockClient.send(`${ "a".repeat(1200) }\r\n.\r\nNOOP\r\n`);
        await mockClient.expect(
            "500 Line too long (max 1000 characters)\r\n" +
            "500 Syntax error, command unrecognized\r\n" +
            "250 OK\r\n");
        expect(queue.size).toEqual(0);
    });
});
