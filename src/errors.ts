/**
 * Error hierarchy raised by the ECOS client. Every error thrown by the
 * client extends {@link EcosApiError}.
 */
export class EcosApiError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'EcosApiError';
    }
}

/**
 * The client was constructed without a usable API location.
 */
export class InitializationError extends EcosApiError {
    constructor(message: string) {
        super(message);
        this.name = 'InitializationError';
    }
}

export class AuthenticationError extends EcosApiError {
    constructor(message: string = 'Account or password or country error', options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AuthenticationError';
    }
}

export class InvalidJsonError extends EcosApiError {
    constructor(options?: { cause?: unknown }) {
        super('Invalid JSON', options);
        this.name = 'InvalidJsonError';
    }
}

/**
 * The response was valid JSON but did not have the expected shape.
 */
export class InvalidResponseError extends EcosApiError {
    constructor(
        message: string,
        public readonly issues: string[] = []
    ) {
        super(message);
        this.name = 'InvalidResponseError';
    }
}

/**
 * The API answered with `success: false`. `code` is the vendor error code.
 */
export class ApiResponseError extends EcosApiError {
    constructor(
        public readonly code: number,
        public readonly apiMessage: string
    ) {
        super(`API call failed: ${code} ${apiMessage}`);
        this.name = 'ApiResponseError';
    }
}

export class HttpError extends EcosApiError {
    constructor(
        public readonly statusCode: number,
        public readonly httpMessage: string
    ) {
        super(`HTTP error: ${statusCode} ${httpMessage}`);
        this.name = 'HttpError';
    }
}

export class BadRequestError extends HttpError {
    constructor(message: string) {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

/**
 * The access token is missing, expired or wrong.
 */
export class UnauthorizedError extends HttpError {
    constructor(message: string) {
        super(401, message);
        this.name = 'UnauthorizedError';
    }
}

export class ForbiddenError extends HttpError {
    constructor(message: string) {
        super(403, message);
        this.name = 'ForbiddenError';
    }
}

export class NotFoundError extends HttpError {
    constructor(message: string) {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

export class MethodNotAllowedError extends HttpError {
    constructor(message: string) {
        super(405, message);
        this.name = 'MethodNotAllowedError';
    }
}

export class UnsupportedMediaTypeError extends HttpError {
    constructor(message: string) {
        super(415, message);
        this.name = 'UnsupportedMediaTypeError';
    }
}

export class HomeDoesNotExistError extends EcosApiError {
    constructor(
        public readonly homeId: string,
        options?: { cause?: unknown }
    ) {
        super(`Home does not exist: ${homeId}`, options);
        this.name = 'HomeDoesNotExistError';
    }
}

export class UnauthorizedDeviceError extends EcosApiError {
    constructor(
        public readonly deviceId: string,
        options?: { cause?: unknown }
    ) {
        super(`Device is not authorized or unknown: ${deviceId}`, options);
        this.name = 'UnauthorizedDeviceError';
    }
}

export class ParameterVerificationFailedError extends EcosApiError {
    constructor(message: string = 'Parameter verification failed', options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ParameterVerificationFailedError';
    }
}

/**
 * Build the error matching an HTTP status code. Statuses without a dedicated
 * class become a plain {@link HttpError}.
 */
export function httpErrorFor(statusCode: number, message: string): HttpError {
    switch (statusCode) {
        case 400:
            return new BadRequestError(message);
        case 401:
            return new UnauthorizedError(message);
        case 403:
            return new ForbiddenError(message);
        case 404:
            return new NotFoundError(message);
        case 405:
            return new MethodNotAllowedError(message);
        case 415:
            return new UnsupportedMediaTypeError(message);
        default:
            return new HttpError(statusCode, message);
    }
}

/**
 * Vendor error codes carried in the `code` field of a failed response.
 */
export enum ECOS_ERROR_CODE {
    PARAMETER_VERIFICATION_FAILED = 20404,
    ACCOUNT_OR_PASSWORD_ERROR = 20414,
    UNAUTHORIZED_DEVICE = 20424,
    HOME_DOES_NOT_EXIST = 20450,
}
