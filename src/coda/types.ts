import type { CellValue } from '../schema/api.js'

export type JsonObject = Record<string, unknown>

export type QueryValue = string | number | boolean | undefined
export type QueryParams = Record<string, QueryValue>

/** What a verb resolves to when a 2xx answer carries no JSON object. */
export interface StatusDescriptor {
    status: number
}

export interface PageOptions {
    /** Maximum number of items; pagination stops once reached. */
    limit?: number
    /** Continuation token from an earlier listing, re-sent verbatim. */
    pageToken?: string
}

export interface ListDocsOptions extends PageOptions {
    isOwner?: boolean
    query?: string
    sourceDoc?: string
}

export interface CreateDocOptions {
    sourceDoc?: string
    timezone?: string
    folderId?: string
}

export type ValueFormat = 'simple' | 'simpleWithArrays' | 'rich'

export interface ListRowsOptions extends PageOptions {
    query?: string
    sortBy?: 'createdAt' | 'natural'
    visibleOnly?: boolean
    valueFormat?: ValueFormat
    useColumnNames?: boolean
}

export interface GetRowOptions {
    valueFormat?: ValueFormat
    useColumnNames?: boolean
}

export interface CellPayload {
    /** Column id or name. */
    column: string
    value: CellValue
}

export interface RowPayload {
    cells: CellPayload[]
}

export interface UpsertRowsOptions {
    /** Columns (ids or names) whose values identify an existing row. */
    keyColumns?: string[]
}

/**
 * Answer to a write. Coda applies writes asynchronously, so this only says
 * the request was accepted.
 */
export interface WriteAcknowledgment {
    status: number
    requestId?: string
    addedRowIds?: string[]
    id?: string
}

export interface Page<T> {
    items: T[]
    href?: string
}
