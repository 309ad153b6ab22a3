export { createServer, SmtpServer, SmtpListenOptions } from "./smtp/smtp_server";
export { SmtpConnection, SmtpConnectionOptions, SmtpTimeouts } from "./smtp/smtp_connection";
export { SmtpProtocol, SmtpProtocolOptions, SmtpStep, END_OF_DATA } from "./smtp/protocol/smtp_protocol";
export { SmtpCommandHandler, SmtpCommandOptions, CommandResult, EHLO_CAPABILITIES, validateEmailAddress } from "./smtp/protocol/smtp_commands";
export { SmtpSession, SmtpState, SmtpVerb, SMTP_VERBS, canExecute, isSmtpVerb } from "./smtp/protocol/smtp_session";
export { SmtpResponse, parseSmtpReply, CRLF, TRUNCATED_MESSAGE } from "./smtp/protocol/smtp_response";
export { SmtpParser, LineResult } from "./smtp/protocol/smtp_parser";
export { Email } from "./smtp/protocol/email";
export { EmailQueue, EmailSink } from "./smtp/lib/email_queue";
export { SmtpError, SmtpErrorKind, SmtpReply, toSmtpReply, invalidState, invalidSyntax } from "./smtp/lib/errors";
export { SmtpLimits } from "./smtp/lib/limits";
export {
    SmtpException,
    TimeoutException,
    ConnectionClosedException,
    ServerNotListeningException
} from "./smtp/lib/exceptions";
export { loadConfig, Config } from "./lib/config";
