/**
 * Protocol failures. Every kind maps to exactly one reply code and message template, see {@link toSmtpReply}.
 * The table is what existing clients match against, so it must not change.
 */
export type SmtpError =
    | { kind: "io" }
    | { kind: "invalidCommand" }
    | { kind: "invalidState", detail: string }
    | { kind: "invalidSyntax", detail: string }
    | { kind: "lineTooLong", max: number }
    | { kind: "pathTooLong", max: number }
    | { kind: "tooManyRecipients", max: number }
    | { kind: "tooMuchData", max: number }
    | { kind: "domainTooLong", max: number }
    | { kind: "userTooLong", max: number }
    | { kind: "nonUtf8Data" }
    | { kind: "connectionClosed" }
    | { kind: "protocolViolation" };

export type SmtpErrorKind = SmtpError["kind"];

export interface SmtpReply {
    code: string;
    message: string;
}

export function invalidState(detail: string): SmtpError {
    return { kind: "invalidState", detail };
}

export function invalidSyntax(detail: string): SmtpError {
    return { kind: "invalidSyntax", detail };
}

export function toSmtpReply(error: SmtpError): SmtpReply {
    switch (error.kind) {
        case "io":
            return { code: "421", message: "Service not available" };
        case "invalidCommand":
            return { code: "500", message: "Syntax error, command unrecognized" };
        case "invalidState":
            return { code: "503", message: `Bad sequence of commands: ${ error.detail }` };
        case "invalidSyntax":
            return { code: "501", message: `Syntax error: ${ error.detail }` };
        case "lineTooLong":
            return { code: "500", message: `Line too long (max ${ error.max } characters)` };
        case "pathTooLong":
            return { code: "501", message: `Path too long (max ${ error.max } characters)` };
        case "tooManyRecipients":
            return { code: "552", message: `Too many recipients (max ${ error.max })` };
        case "tooMuchData":
            return { code: "552", message: `Too much mail data (max ${ error.max } bytes)` };
        case "domainTooLong":
            return { code: "501", message: `Domain name too long (max ${ error.max } characters)` };
        case "userTooLong":
            return { code: "501", message: `User name too long (max ${ error.max } characters)` };
        case "nonUtf8Data":
            return { code: "500", message: "Invalid character encoding" };
        case "connectionClosed":
            return { code: "421", message: "Connection closed" };
        case "protocolViolation":
            return { code: "500", message: "Protocol violation" };
    }
}
