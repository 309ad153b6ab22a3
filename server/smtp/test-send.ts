import "dotenv/config";
import nodemailer from "nodemailer";
import { DEFAULT_PORT, parseListenAddress } from "../lib/config";
import { parseSmtpReply } from "./protocol/smtp_response";

async function main(args: string[]) {
    const [hostPort, from, to, subject, message] = args;

    if (!hostPort || !from || !to) {
        console.error("Usage: test-send <host>[:<port>] <from> <to> [<subject> [<message>]]");
        process.exitCode = 1;
        return;
    }

    const { host, port } = parseListenAddress(hostPort, DEFAULT_PORT);

    const transporter = nodemailer.createTransport({
        logger: true,
        host: host,
        port: port,
        secure: false,
        ignoreTLS: true,
    });

    console.log(`Sending test email from ${ from } to ${ to }...`);

    const info = await transporter.sendMail({
        from,
        to,
        subject: subject ?? "Hello!",
        text: message ?? "Hello from smtp-testbed!",
    });

    const reply = parseSmtpReply(info.response);
    console.log(`Sent, server replied ${ reply ? `${ reply.code } ${ reply.message }` : info.response }`);
}

main(process.argv.slice(2)).catch((err) => {
    console.error(err);
    process.exitCode = 1;
});
