import type { WriteAcknowledgment } from '../coda/types.js'
import { looksLikeId } from '../coda/utils.js'
import { AmbiguousReferenceError, NotFoundError } from '../errors.js'
import type { CellValue, RowData } from '../schema/api.js'
import { Cell, type CellInput, columnReference } from './cell.js'
import { Column } from './column.js'
import { lookup, type Lookup } from './resolve.js'
import type { Table } from './table.js'

export type CellLookup =
    | { kind: 'found'; cell: Cell }
    | { kind: 'not_found'; reference: string }
    | { kind: 'ambiguous'; reference: string; matches: Column[] }

/**
 * A row as last fetched. Values are keyed by column id and are never
 * refreshed behind the caller's back; call {@link refresh} to re-read them.
 */
export class Row {
    private data: RowData

    constructor(
        readonly table: Table,
        data: RowData
    ) {
        this.data = data
    }

    get id(): string {
        return this.data.id
    }

    /** Value of the table's display column. */
    get name(): string {
        return this.data.name ?? ''
    }

    get index(): number | undefined {
        return this.data.index
    }

    get browserLink(): string | undefined {
        return this.data.browserLink
    }

    get createdAt(): Date | undefined {
        return this.data.createdAt
    }

    get updatedAt(): Date | undefined {
        return this.data.updatedAt
    }

    get values(): Readonly<Record<string, CellValue>> {
        return this.data.values
    }

    /** Cells in column order, for the columns this row has values for. */
    async cells(): Promise<Cell[]> {
        const columns = await this.table.columns()
        return columns.filter((c) => c.id in this.data.values).map((c) => new Cell(this, c, this.data.values[c.id]))
    }

    /** Resolves a column reference to this row's cell without throwing. */
    async lookupCell(reference: Column | string): Promise<CellLookup> {
        const columns = await this.table.columns()
        const found: Lookup<Column> =
            reference instanceof Column
                ? lookup(reference.id, columns, true)
                : lookup(reference, columns, looksLikeId('column', reference))
        if (found.kind !== 'found') return found
        return { kind: 'found', cell: new Cell(this, found.value, this.data.values[found.value.id] ?? null) }
    }

    /** Like {@link lookupCell}, but unknown or ambiguous columns throw. */
    async getCell(reference: Column | string): Promise<Cell> {
        const result = await this.lookupCell(reference)
        switch (result.kind) {
            case 'found':
                return result.cell
            case 'not_found':
                throw new NotFoundError('column', result.reference)
            case 'ambiguous':
                throw new AmbiguousReferenceError(
                    'column',
                    result.reference,
                    result.matches.map((c) => c.id)
                )
        }
    }

    /** Re-reads the row from Coda. */
    async refresh(): Promise<Row> {
        this.data = await this.table.fetchRowData(this.id)
        return this
    }

    async update(cells: CellInput[]): Promise<WriteAcknowledgment> {
        const ack = await this.table.updateRow(this, cells)
        for (const cell of cells) this.remember(columnReference(cell.column), cell.value)
        return ack
    }

    async setCellValue(column: Column | string, value: CellValue): Promise<WriteAcknowledgment> {
        return this.update([{ column, value }])
    }

    async delete(): Promise<WriteAcknowledgment> {
        return this.table.deleteRow(this)
    }

    // Local copy only; Coda may not show the write until later
    private remember(column: string, value: CellValue): void {
        const id = looksLikeId('column', column)
            ? column
            : this.table.loadedColumns()?.find((c) => c.name === column)?.id
        if (id) this.data = { ...this.data, values: { ...this.data.values, [id]: value } }
    }

    toString(): string {
        return `Row(${this.name})`
    }
}
