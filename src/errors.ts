import { isAxiosError } from 'axios'

export type RemoteErrorCode =
    | 'ERR_UNAUTHORIZED'
    | 'ERR_FORBIDDEN'
    | 'ERR_NOT_FOUND'
    | 'ERR_TIMEOUT'
    | 'ERR_RATE_LIMITED'
    | 'ERR_SERVER'
    | 'ERR_BAD_REQUEST'

export type TransportErrorCode = 'ERR_TIMEOUT' | 'ERR_NETWORK' | 'ERR_MALFORMED_RESPONSE'

export type ConfigErrorCode = 'ERR_NO_API_KEY' | 'ERR_INVALID_CONFIG'

export type ErrorCode =
    | RemoteErrorCode
    | TransportErrorCode
    | ConfigErrorCode
    | 'ERR_AMBIGUOUS_REFERENCE'
    | 'ERR_REFERENCE_NOT_FOUND'
    | 'ERR_INVALID_FILTER'

/** Resource kinds the object model resolves by reference. */
export type ReferenceKind = 'document' | 'table' | 'view' | 'column' | 'row' | 'cell'

export class CodaError extends Error {
    readonly code: ErrorCode
    readonly meta?: Record<string, unknown>

    constructor(code: ErrorCode, message: string, options?: { meta?: Record<string, unknown>; cause?: unknown }) {
        super(message, options?.cause === undefined ? undefined : { cause: options.cause })
        this.name = new.target.name
        this.code = code
        if (options?.meta) this.meta = options.meta
    }
}

/** The API answered with a status of 400 or above. */
export class RemoteRejectionError extends CodaError {
    readonly status: number
    readonly body: unknown
    readonly op: string

    constructor(code: RemoteErrorCode, status: number, message: string, body: unknown, op: string) {
        super(code, message, { meta: { op, status } })
        this.status = status
        this.body = body
        this.op = op
    }
}

/** The request never produced a usable answer. */
export class TransportFailureError extends CodaError {
    readonly op: string

    constructor(code: TransportErrorCode, message: string, op: string, cause?: unknown) {
        super(code, message, { meta: { op }, cause })
        this.op = op
    }
}

export class AmbiguousReferenceError extends CodaError {
    readonly kind: ReferenceKind
    readonly reference: string
    readonly matches: string[]

    constructor(kind: ReferenceKind, reference: string, matches: string[]) {
        super('ERR_AMBIGUOUS_REFERENCE', `${matches.length} ${kind}s match "${reference}": ${matches.join(', ')}`, {
            meta: { kind, reference, matches },
        })
        this.kind = kind
        this.reference = reference
        this.matches = matches
    }
}

export class NotFoundError extends CodaError {
    readonly kind: ReferenceKind
    readonly reference: string

    constructor(kind: ReferenceKind, reference: string, cause?: unknown) {
        super('ERR_REFERENCE_NOT_FOUND', `No ${kind} matches "${reference}"`, { meta: { kind, reference }, cause })
        this.kind = kind
        this.reference = reference
    }
}

export class ConfigurationError extends CodaError {
    constructor(code: ConfigErrorCode, message: string) {
        super(code, message)
    }
}

export class InvalidFilterError extends CodaError {
    constructor(message: string) {
        super('ERR_INVALID_FILTER', message)
    }
}

export function isCodaError(error: unknown): error is CodaError {
    return error instanceof CodaError
}

export function isNotFoundRejection(error: unknown): error is RemoteRejectionError {
    return error instanceof RemoteRejectionError && error.status === 404
}

function remoteCode(status: number): RemoteErrorCode {
    if (status === 401) return 'ERR_UNAUTHORIZED'
    if (status === 403) return 'ERR_FORBIDDEN'
    if (status === 404) return 'ERR_NOT_FOUND'
    if (status === 408) return 'ERR_TIMEOUT'
    if (status === 429) return 'ERR_RATE_LIMITED'
    if (status >= 500) return 'ERR_SERVER'
    return 'ERR_BAD_REQUEST'
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// Coda error bodies look like { statusCode, statusMessage, message }
function remoteMessage(status: number, data: unknown): string {
    if (typeof data === 'string' && data.trim()) return data
    if (isRecord(data)) {
        if (typeof data.message === 'string') return data.message
        if (typeof data.statusMessage === 'string') return data.statusMessage
    }
    return `Request failed with status ${status}`
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT'])

export function toCodedAxiosError(error: unknown, op: string): CodaError {
    if (error instanceof CodaError) return error
    if (!isAxiosError(error)) {
        const message = error instanceof Error ? error.message : String(error)
        return new TransportFailureError('ERR_NETWORK', message, op, error)
    }
    const status = error.response?.status
    if (error.response && status !== undefined) {
        const data: unknown = error.response.data
        return new RemoteRejectionError(remoteCode(status), status, remoteMessage(status, data), data, op)
    }
    if (error.code && TIMEOUT_CODES.has(error.code)) {
        return new TransportFailureError('ERR_TIMEOUT', error.message, op, error)
    }
    return new TransportFailureError('ERR_NETWORK', error.message, op, error)
}
