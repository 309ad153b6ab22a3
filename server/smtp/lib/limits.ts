/**
 * Size limits of RFC 821, section 4.5.3. All lengths are in bytes.
 */
export const SmtpLimits = {
    /** Local part of an address */
    USER_MAX_LENGTH: 64,
    DOMAIN_MAX_LENGTH: 64,
    /** Reverse-path or forward-path */
    PATH_MAX_LENGTH: 256,
    /** Command line without the terminating CRLF */
    COMMAND_LINE_MAX_LENGTH: 512,
    /** Reply line including CRLF */
    REPLY_LINE_MAX_LENGTH: 512,
    /** Text line including CRLF */
    TEXT_LINE_MAX_LENGTH: 1000,
    MAX_RECIPIENTS: 100,
    /** Cumulative mail data of one transaction, kept in memory */
    MAX_DATA_SIZE: 10 * 1024 * 1024,
} as const;

/** Every stored data line is accounted with the CRLF it was received with */
export const LINE_TERMINATOR_OVERHEAD = 2;

export function byteLength(value: string): number {
    return Buffer.byteLength(value, "utf-8");
}
