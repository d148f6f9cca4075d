/**
 * Base class for every error the CLI knows how to report.
 *
 * `recoverable` marks conditions that can go away on their own: the recording flow folds
 * them into a discard, and a failed request may succeed when tried again.
 */
export class CommandError extends Error {
    declare readonly cause?: Error;

    constructor(
        message: string,
        public readonly code: string,
        public readonly recoverable: boolean = false,
        cause?: Error
    ) {
        super(message);
        this.name = 'CommandError';
        this.cause = cause;
    }
}

export class ConfigurationError extends CommandError {
    constructor(message: string, cause?: Error) {
        super(message, 'CONFIGURATION_ERROR', false, cause);
        this.name = 'ConfigurationError';
    }
}

export class CaptureUnavailableError extends CommandError {
    constructor(message: string, cause?: Error) {
        super(message, 'CAPTURE_UNAVAILABLE', false, cause);
        this.name = 'CaptureUnavailableError';
    }
}

export class CaptureInterruptedError extends CommandError {
    constructor(message: string, cause?: Error) {
        super(message, 'CAPTURE_INTERRUPTED', true, cause);
        this.name = 'CaptureInterruptedError';
    }
}

export class InputStreamClosedError extends CommandError {
    constructor(message: string = 'Input stream closed unexpectedly', cause?: Error) {
        super(message, 'INPUT_STREAM_CLOSED', true, cause);
        this.name = 'InputStreamClosedError';
    }
}

export class PromptInterruptedError extends CommandError {
    constructor(message: string = 'Operation cancelled by user') {
        super(message, 'PROMPT_INTERRUPTED', true);
        this.name = 'PromptInterruptedError';
    }
}

// No status means the request never got an answer
const isTransientStatus = (status?: number): boolean =>
    status === undefined || status === 429 || status >= 500;

export class RequestError extends CommandError {
    constructor(
        message: string,
        public readonly status?: number,
        public readonly responseBody?: string,
        cause?: Error
    ) {
        super(message, 'REQUEST_ERROR', isTransientStatus(status), cause);
        this.name = 'RequestError';
    }
}

export class FileStateError extends CommandError {
    constructor(message: string, public readonly filePath: string, cause?: Error) {
        super(message, 'FILE_STATE_ERROR', false, cause);
        this.name = 'FileStateError';
    }
}

export class UserCancellationError extends CommandError {
    constructor(message: string = 'Operation cancelled by user') {
        super(message, 'USER_CANCELLED', true);
        this.name = 'UserCancellationError';
    }
}
