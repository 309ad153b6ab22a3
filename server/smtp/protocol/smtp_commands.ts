import { invalidState, invalidSyntax, SmtpError } from "../lib/errors";
import { byteLength, SmtpLimits } from "../lib/limits";
import { SmtpResponse } from "./smtp_response";
import { isSmtpVerb, SmtpSession, SmtpVerb } from "./smtp_session";

export const EHLO_CAPABILITIES: readonly string[] = ["PIPELINING", "SIZE 10240000"];

export type CommandResult =
    | { response: SmtpResponse, close: boolean, error?: undefined }
    | { response?: undefined, close?: undefined, error: SmtpError };

export interface SmtpCommandOptions {
    /** Accept EHLO and announce {@link EHLO_CAPABILITIES} */
    ehlo: boolean;
}

type PathKeyword = "FROM" | "TO";

function success(response: SmtpResponse, close: boolean = false): CommandResult {
    return { response, close };
}

function failure(error: SmtpError): CommandResult {
    return { error };
}

function fromSessionResult(error: SmtpError | null, response: SmtpResponse): CommandResult {
    return error ? failure(error) : success(response);
}

/**
 * Checks that the address has a single `@` and both parts fit the limits.
 */
export function validateEmailAddress(address: string): SmtpError | null {
    const atIndex = address.indexOf("@");
    if (atIndex === -1) {
        return invalidSyntax("Email address must contain @ symbol");
    }

    const user = address.substring(0, atIndex);
    const domain = address.substring(atIndex + 1);

    if (byteLength(user) > SmtpLimits.USER_MAX_LENGTH) {
        return { kind: "userTooLong", max: SmtpLimits.USER_MAX_LENGTH };
    }
    if (byteLength(domain) > SmtpLimits.DOMAIN_MAX_LENGTH) {
        return { kind: "domainTooLong", max: SmtpLimits.DOMAIN_MAX_LENGTH };
    }
    if (user.length === 0 || domain.length === 0 || domain.includes("@")) {
        return invalidSyntax("Invalid email address format");
    }

    return null;
}

export class SmtpCommandHandler {
    private readonly hostname: string;
    private readonly options: SmtpCommandOptions;

    constructor(hostname: string, options: SmtpCommandOptions = { ehlo: true }) {
        this.hostname = hostname;
        this.options = options;
    }

    public processCommand(line: string, session: SmtpSession): CommandResult {
        if (byteLength(line) > SmtpLimits.COMMAND_LINE_MAX_LENGTH) {
            return failure({ kind: "lineTooLong", max: SmtpLimits.COMMAND_LINE_MAX_LENGTH });
        }

        const parts = line.split(/\s+/).filter((part) => part.length > 0);
        if (parts.length === 0) {
            return failure({ kind: "invalidCommand" });
        }

        const name = parts[0].toUpperCase();
        if (!isSmtpVerb(name) || (name === "EHLO" && !this.options.ehlo)) {
            return failure({ kind: "invalidCommand" });
        }

        return this.dispatch(name, parts, session);
    }

    private dispatch(verb: SmtpVerb, parts: string[], session: SmtpSession): CommandResult {
        switch (verb) {
            case "HELO":
                return this.smtpHelo(parts, session);
            case "EHLO":
                return this.smtpEhlo(parts, session);
            case "MAIL":
                return this.smtpMail(parts, session);
            case "RCPT":
                return this.smtpRcpt(parts, session);
            case "DATA":
                return this.smtpData(parts, session);
            case "RSET":
                return this.smtpRset(session);
            case "NOOP":
                return success(SmtpResponse.ok());
            case "QUIT":
                return success(SmtpResponse.quit(), true);
        }
    }

    private smtpHelo(parts: string[], session: SmtpSession): CommandResult {
        if (parts.length < 2) {
            return failure(invalidSyntax("HELO requires domain argument"));
        }

        const clientDomain = parts[1];
        return fromSessionResult(session.setClientDomain(clientDomain), SmtpResponse.helo(this.hostname, clientDomain));
    }

    private smtpEhlo(parts: string[], session: SmtpSession): CommandResult {
        if (parts.length < 2) {
            return failure(invalidSyntax("EHLO requires domain argument"));
        }

        const clientDomain = parts[1];
        return fromSessionResult(session.setClientDomain(clientDomain),
            SmtpResponse.ehlo(this.hostname, clientDomain, EHLO_CAPABILITIES));
    }

    private smtpMail(parts: string[], session: SmtpSession): CommandResult {
        if (!session.canExecute("MAIL")) {
            return failure(invalidState("MAIL command requires HELO first"));
        }

        const { address, error } = this.parsePath("MAIL", "FROM", parts);
        if (error) {
            return failure(error);
        }
        return fromSessionResult(session.setSender(address), SmtpResponse.ok());
    }

    private smtpRcpt(parts: string[], session: SmtpSession): CommandResult {
        if (!session.canExecute("RCPT")) {
            return failure(invalidState("RCPT command requires MAIL first"));
        }

        const { address, error } = this.parsePath("RCPT", "TO", parts);
        if (error) {
            return failure(error);
        }
        return fromSessionResult(session.addRecipient(address), SmtpResponse.ok());
    }

    private smtpData(parts: string[], session: SmtpSession): CommandResult {
        if (!session.canExecute("DATA")) {
            return failure(invalidState("DATA command requires RCPT first"));
        }
        if (parts.length > 1) {
            return failure(invalidSyntax("DATA command takes no arguments"));
        }

        return fromSessionResult(session.startDataMode(), SmtpResponse.dataStart());
    }

    private smtpRset(session: SmtpSession): CommandResult {
        if (!session.canExecute("RSET")) {
            return failure(invalidState("RSET command requires HELO first"));
        }

        session.reset();
        return success(SmtpResponse.ok());
    }

    /**
     * Extracts the address of `FROM:<address>` or `TO:<address>`.
     */
    private parsePath(verb: "MAIL" | "RCPT", keyword: PathKeyword, parts: string[]): { address: string, error?: undefined } | { address?: undefined, error: SmtpError } {
        if (parts.length < 2) {
            return { error: invalidSyntax(`${ verb } requires ${ keyword } argument`) };
        }

        const argument = parts.slice(1).join(" ");
        const prefix = `${ keyword }:`;
        if (!argument.toUpperCase().startsWith(prefix)) {
            return { error: invalidSyntax(`${ verb } command must be '${ verb } ${ prefix }<address>'`) };
        }

        const path = argument.substring(prefix.length).trim();
        if (path.length < 2 || !path.startsWith("<") || !path.endsWith(">") || /[<>]/.test(path.substring(1, path.length - 1))) {
            return { error: invalidSyntax(`${ keyword } address must be enclosed in angle brackets`) };
        }

        const address = path.substring(1, path.length - 1);
        if (address.length === 0) {
            return { error: invalidSyntax(`${ keyword } address cannot be empty`) };
        }

        const error = validateEmailAddress(address);
        return error ? { error } : { address };
    }
}
