import { isAxiosError } from 'axios'

import { logger } from '../logger.js'
import type { CellValue } from '../schema/api.js'
import type { JsonObject } from './types.js'

export interface RequestMeta {
    requestId: string
    startedAt: number
    op: string
}

declare module 'axios' {
    interface AxiosRequestConfig {
        /** Logical operation name, used in logs and errors. */
        op?: string
        metadata?: RequestMeta
    }
}

export function isRateLimited(error: unknown): boolean {
    return isAxiosError(error) && error.response?.status === 429
}

export function logAxiosError(error: unknown, op: string): void {
    if (!isAxiosError(error)) {
        logger.error({ op, err: error }, 'Coda API request failed')
        return
    }
    const cfg = error.config
    const meta = cfg?.metadata
    logger.error(
        {
            op,
            method: cfg?.method,
            url: cfg?.url,
            base_url: cfg?.baseURL,
            status: error.response?.status,
            data: error.response?.data,
            request_id: meta?.requestId,
            duration_ms: meta ? Date.now() - meta.startedAt : undefined,
            error_code: error.code,
            error_message: error.message,
        },
        'Coda API request failed'
    )
}

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Joins path segments, URI-encoding each one. Names may contain spaces or slashes. */
export function apiPath(...segments: string[]): string {
    return '/' + segments.map((s) => encodeURIComponent(s)).join('/')
}

const ID_PATTERNS = {
    table: /^(grid|table|view)-[\w-]+$/,
    view: /^(grid|table|view)-[\w-]+$/,
    column: /^c-[\w-]+$/,
    row: /^i-[\w-]+$/,
} as const

export type IdKind = keyof typeof ID_PATTERNS

/** Whether a reference has the shape of an id of the given kind rather than a display name. */
export function looksLikeId(kind: IdKind, reference: string): boolean {
    return ID_PATTERNS[kind].test(reference)
}

/**
 * Encodes a single-column equality filter in the `query` syntax of the rows
 * endpoint: column ids go bare, names are quoted, values are JSON.
 */
export function formatRowQuery(column: string, value: CellValue): string {
    const key = looksLikeId('column', column) ? column : JSON.stringify(column)
    return `${key}:${JSON.stringify(value)}`
}
