/**
 * Raised when no bytes exist at the requested position: a negative offset,
 * or a server answering a range request with anything but 200 or 206.
 * Stream consumers treat it as the logical end of input, not a failure.
 */
class EndOfDataError extends Error {
    constructor(message: string = 'end of data') {
        super(message);
        this.name = 'EndOfDataError';
    }
}

/**
 * Raised for operations the reader deliberately does not provide.
 */
class NotImplementedError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NotImplementedError';
    }
}

class InvalidArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidArgumentError';
    }
}

/**
 * Raised when the remote resource does not report a usable Content-Length.
 */
class ContentLengthError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ContentLengthError';
    }
}

export { EndOfDataError, NotImplementedError, InvalidArgumentError, ContentLengthError };
