#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./lib/config";
import { createServer as createSmtpServer } from "./smtp/smtp_server";
import { EmailQueue } from "./smtp/lib/email_queue";
import { formatAddressPort } from "./smtp/lib/address";
import { Waitable } from "./smtp/lib/waitable";

async function consume(queue: EmailQueue) {
    let count = 0;
    for (let email = await queue.receive(); email; email = await queue.receive()) {
        count += 1;
        console.log(`Received email #${ count } from <${ email.from }> to ${
            email.to.map((recipient) => `<${ recipient }>`).join(", ") } (${ email.dataSize } bytes)`);
        console.log(`  Subject: ${ email.subject ?? "(none)" }`);
    }
    console.log(`Received ${ count } email(s) in total`);
}

async function main() {
    const config = loadConfig(process.env, process.argv.slice(2));

    // noinspection SpellCheckingInspection
    const terminationWaitable = new Waitable<void>(undefined);
    process.on("SIGINT", () => terminationWaitable.set());
    process.on("SIGTERM", () => terminationWaitable.set());

    const queue = new EmailQueue(config.queue.capacity);
    const consumer = consume(queue);

    const { host, port } = config.smtp.server;
    console.log(`> Starting SMTP server to listen at smtp://${ formatAddressPort({ address: host, port, family: "" }) }`);

    const smtpServer = createSmtpServer(config.smtp.connection, config.smtp.server, queue);
    try {
        await smtpServer.listen();
        console.log(`> SMTP server listening at smtp://${ formatAddressPort(smtpServer.address) } as ${
            config.smtp.connection.hostname }`);

        // Wait for termination
        await terminationWaitable.promise;

        console.log("Terminating...");
    } catch (err) {
        console.error(err);
        console.log("Cleaning up...");
    }

    try {
        await smtpServer.close();
    } catch (err) {
        console.error(err);
    }
    queue.close();
    await consumer;

    console.log("Terminated");
}

main().then(
    () => process.exit(0),
    (err) => {
        console.error(err);
        process.exit(1);
    });
