// noinspection JSUnusedGlobalSymbols
declare namespace NodeJS {
    interface ProcessEnv {
        SMTP_HOST?: string;
        SMTP_PORT?: string;
        SMTP_HOSTNAME?: string;
        SMTP_GREETING?: string;
        SMTP_EHLO?: string;
        SMTP_CLIENT_TIMEOUT_MS?: string;
        SMTP_QUEUE_CAPACITY?: string;
    }
}
