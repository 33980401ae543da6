import type { ColumnData } from '../schema/api.js'
import type { Named } from './resolve.js'
import type { Table } from './table.js'

export class Column implements Named {
    readonly id: string
    readonly name: string
    /** Formula-derived columns are read-only. */
    readonly calculated: boolean
    /** Whether this is the table's display column. */
    readonly display: boolean
    readonly formula?: string
    readonly format?: Record<string, unknown>
    readonly href?: string

    constructor(
        readonly table: Table,
        data: ColumnData
    ) {
        this.id = data.id
        this.name = data.name
        this.calculated = data.calculated ?? false
        this.display = data.display ?? false
        this.formula = data.formula
        this.format = data.format
        this.href = data.href
    }

    toString(): string {
        return `Column(${this.name})`
    }
}
