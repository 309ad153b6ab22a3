import _ from "lodash";
import yn from "yn";
import { isIPv6 } from "node:net";
import { SmtpConnectionOptions } from "../smtp/smtp_connection";
import { SmtpListenOptions } from "../smtp/smtp_server";

export type QueueOptions = {
    /** Undefined means unbounded */
    capacity?: number,
};

export type SmtpOptions = {
    server: Required<SmtpListenOptions>,
    connection: SmtpConnectionOptions,
};

export type Config = {
    smtp: SmtpOptions,
    queue: QueueOptions,
};

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 2525;
export const DEFAULT_HOSTNAME = "smtp-testbed.local";
export const DEFAULT_GREETING = "Welcome to smtp-testbed";
export const DEFAULT_CLIENT_TIMEOUT_MS = 300000;

function envValue(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return _.isEmpty(trimmed) ? undefined : trimmed;
}

function parsePort(port: string, source: string): number {
    const value = Number(port.trim());
    if (!Number.isInteger(value) || value < 0 || value > 65535) {
        throw new Error(`Invalid port in ${ source }: ${ port }`);
    }
    return value;
}

function parseNonNegative(value: string | undefined, defaultValue: number, source: string): number {
    if (value === undefined || _.isEmpty(value.trim())) {
        return defaultValue;
    }
    const parsed = Number(value.trim());
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new Error(`Invalid value of ${ source }: ${ value }`);
    }
    return parsed;
}

/**
 * Splits `address[:port]`, also accepting `[v6]:port` and a bare IPv6 address.
 */
export function parseListenAddress(value: string, defaultPort: number): { host: string, port: number } {
    const bracketed = /^\[([^\]]+)](?::(\d*))?$/.exec(value);
    if (bracketed) {
        const [, host, port] = bracketed;
        return { host, port: _.isEmpty(port) ? defaultPort : parsePort(port, "address") };
    }
    if (isIPv6(value)) {
        return { host: value, port: defaultPort };
    }

    const separator = value.lastIndexOf(":");
    if (separator < 0) {
        return { host: value, port: defaultPort };
    }
    const host = value.substring(0, separator);
    const port = value.substring(separator + 1);
    return {
        host: _.isEmpty(host) ? DEFAULT_HOST : host,
        port: _.isEmpty(port) ? defaultPort : parsePort(port, "address"),
    };
}

/**
 * Builds the configuration from environment variables, overridden by the command line arguments
 * `[address[:port]] [hostname]`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, args: string[] = []): Config {
    const envPortValue = envValue(env.SMTP_PORT);
    const envPort = envPortValue === undefined ? DEFAULT_PORT : parsePort(envPortValue, "SMTP_PORT");
    const addressArg = envValue(args[0]);

    const server = addressArg === undefined
        ? { host: envValue(env.SMTP_HOST) ?? DEFAULT_HOST, port: envPort }
        : parseListenAddress(addressArg, envPort);

    const hostname = envValue(args[1]) ?? envValue(env.SMTP_HOSTNAME) ?? DEFAULT_HOSTNAME;

    const capacityValue = envValue(env.SMTP_QUEUE_CAPACITY);
    const capacity = capacityValue === undefined
        ? undefined
        : parseNonNegative(capacityValue, 0, "SMTP_QUEUE_CAPACITY");

    return {
        smtp: {
            server,
            connection: {
                hostname,
                greeting: envValue(env.SMTP_GREETING) ?? DEFAULT_GREETING,
                ehlo: yn(env.SMTP_EHLO, { default: true }),
                timeouts: {
                    clientMs: parseNonNegative(env.SMTP_CLIENT_TIMEOUT_MS, DEFAULT_CLIENT_TIMEOUT_MS, "SMTP_CLIENT_TIMEOUT_MS"),
                },
            },
        },
        queue: { capacity },
    };
}
