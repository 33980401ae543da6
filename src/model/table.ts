import type { CodaClient } from '../coda/client.js'
import type { ListRowsOptions, PageOptions, WriteAcknowledgment } from '../coda/types.js'
import { formatRowQuery, looksLikeId } from '../coda/utils.js'
import { InvalidFilterError, isNotFoundRejection, NotFoundError } from '../errors.js'
import type { CellValue, RowData, TableData } from '../schema/api.js'
import { type CellInput, columnReference, toCellPayload } from './cell.js'
import { Column } from './column.js'
import type { Document } from './document.js'
import { Lazy } from './lazy.js'
import { expectFound, lookup } from './resolve.js'
import { Row } from './row.js'

/** Equality filter on one column, evaluated by Coda. */
export interface RowFilter {
    column: Column | string
    value: CellValue
}

export interface RowListingOptions extends Omit<ListRowsOptions, 'useColumnNames' | 'query'> {
    filter?: RowFilter
    /** Raw query in the rows endpoint syntax; exclusive with `filter`. */
    query?: string
}

export interface TableUpsertOptions {
    keyColumns?: Array<Column | string>
}

/**
 * A table or view of a document.
 *
 * Columns are fetched once and memoized; call {@link refreshColumns} after a
 * schema change. Rows are fetched fresh by every listing call.
 */
export class Table {
    readonly id: string
    readonly name: string
    readonly type: string
    readonly href?: string
    readonly browserLink?: string
    private readonly columnList: Lazy<Column[]>
    private readonly details: Lazy<TableData>

    constructor(
        readonly document: Document,
        data: TableData
    ) {
        this.id = data.id
        this.name = data.name
        this.type = data.type ?? 'table'
        this.href = data.href
        this.browserLink = data.browserLink
        this.columnList = new Lazy(async () => {
            const page = await this.client.listColumns(this.document.id, this.id)
            return page.items.map((c) => new Column(this, c))
        })
        this.details = new Lazy(() => this.client.getTable(this.document.id, this.id))
        if (data.rowCount !== undefined || data.displayColumn !== undefined) this.details.set(data)
    }

    get client(): CodaClient {
        return this.document.client
    }

    get isView(): boolean {
        return this.type === 'view'
    }

    /** Full table record (row count, display column, timestamps), fetched once. */
    async getDetails(): Promise<TableData> {
        return this.details.ensureLoaded()
    }

    async refreshDetails(): Promise<TableData> {
        return this.details.refresh()
    }

    async columns(): Promise<Column[]> {
        return this.columnList.ensureLoaded()
    }

    async refreshColumns(): Promise<Column[]> {
        return this.columnList.refresh()
    }

    /** Columns if already fetched; never issues a request. */
    loadedColumns(): Column[] | undefined {
        return this.columnList.peek()
    }

    /**
     * Resolves a column by id, or by name when the reference is not
     * id-shaped. A name shared by several columns is an error.
     */
    async getColumn(reference: Column | string): Promise<Column> {
        const columns = await this.columns()
        const ref = columnReference(reference)
        return expectFound('column', lookup(ref, columns, looksLikeId('column', ref)))
    }

    private listingOptions(options: RowListingOptions): ListRowsOptions {
        const { filter, query, ...rest } = options
        if (filter && query !== undefined) {
            throw new InvalidFilterError('Pass either a filter or a raw query, not both')
        }
        if (!filter) return { ...rest, query }
        const column = columnReference(filter.column)
        if (!column) {
            throw new InvalidFilterError('A row filter needs a column id or name')
        }
        return { ...rest, query: formatRowQuery(column, filter.value) }
    }

    /** Fetches the complete (or `limit`-bounded) row listing. */
    async rows(options: RowListingOptions = {}): Promise<Row[]> {
        const page = await this.client.listRows(this.document.id, this.id, this.listingOptions(options))
        return page.items.map((r) => new Row(this, r))
    }

    /**
     * Rows as an async sequence. Each iteration fetches one listing up front,
     * so it works on a snapshot: writes made while iterating do not show up.
     */
    iterateRows(options: RowListingOptions = {}): AsyncIterable<Row> {
        return {
            [Symbol.asyncIterator]: () => {
                let snapshot: Promise<Row[]> | undefined
                let position = 0
                return {
                    next: async (): Promise<IteratorResult<Row>> => {
                        snapshot = snapshot ?? this.rows(options)
                        const rows = await snapshot
                        if (position >= rows.length) return { done: true, value: undefined }
                        return { done: false, value: rows[position++] }
                    },
                }
            },
        }
    }

    /** @internal Used by {@link Row.refresh}. */
    async fetchRowData(rowId: string): Promise<RowData> {
        try {
            return await this.client.getRow(this.document.id, this.id, rowId)
        } catch (error) {
            if (isNotFoundRejection(error)) throw new NotFoundError('row', rowId, error)
            throw error
        }
    }

    async getRowById(rowId: string): Promise<Row> {
        return new Row(this, await this.fetchRowData(rowId))
    }

    /**
     * Resolves a row by id, or by display name when the reference is not
     * id-shaped. A display name shared by several rows is an error.
     */
    async getRow(reference: Row | string): Promise<Row> {
        if (reference instanceof Row) return this.getRowById(reference.id)
        if (looksLikeId('row', reference)) return this.getRowById(reference)
        return expectFound('row', lookup(reference, await this.rows(), false))
    }

    /** All rows whose `column` equals `value`, in listing order. */
    async findRowsByColumnValue(column: Column | string, value: CellValue, options: PageOptions = {}): Promise<Row[]> {
        return this.rows({ ...options, filter: { column, value } })
    }

    /**
     * The first row (in listing order) whose `column` equals `value`.
     * Further matches are ignored.
     */
    async findRowByColumnValue(column: Column | string, value: CellValue): Promise<Row | undefined> {
        const [first] = await this.findRowsByColumnValue(column, value, { limit: 1 })
        return first
    }

    async upsertRow(cells: CellInput[], options: TableUpsertOptions = {}): Promise<WriteAcknowledgment> {
        return this.upsertRows([cells], options)
    }

    /**
     * Inserts the given rows in a single request. Rows whose `keyColumns`
     * values match an existing row update it instead. Coda processes the
     * write asynchronously; the result is an acknowledgment only.
     */
    async upsertRows(rows: CellInput[][], options: TableUpsertOptions = {}): Promise<WriteAcknowledgment> {
        return this.client.upsertRows(
            this.document.id,
            this.id,
            rows.map((cells) => ({ cells: cells.map(toCellPayload) })),
            { keyColumns: options.keyColumns?.map(columnReference) }
        )
    }

    async updateRow(row: Row | string, cells: CellInput[]): Promise<WriteAcknowledgment> {
        const rowId = row instanceof Row ? row.id : row
        return this.client.updateRow(this.document.id, this.id, rowId, { cells: cells.map(toCellPayload) })
    }

    /** Deleting a row that is already gone rejects with a 404 {@link RemoteRejectionError}. */
    async deleteRow(row: Row | string): Promise<WriteAcknowledgment> {
        const rowId = row instanceof Row ? row.id : row
        return this.client.deleteRow(this.document.id, this.id, rowId)
    }

    toString(): string {
        return `Table(${this.name})`
    }
}
