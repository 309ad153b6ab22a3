export class SmtpException extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'SmtpException';
    }
}

export class TimeoutException extends SmtpException {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'TimeoutException';
    }
}

export class ConnectionClosedException extends SmtpException {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ConnectionClosedException';
    }
}

export class ServerNotListeningException extends SmtpException {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ServerNotListeningException';
    }
}
