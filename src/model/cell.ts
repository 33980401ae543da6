import type { CellPayload, WriteAcknowledgment } from '../coda/types.js'
import type { CellValue } from '../schema/api.js'
import { Column } from './column.js'
import type { Row } from './row.js'

/** A value to write, addressed by column object, id or name. */
export interface CellInput {
    column: Column | string
    value: CellValue
}

export function columnReference(column: Column | string): string {
    return column instanceof Column ? column.id : column
}

export function toCellPayload(input: CellInput): CellPayload {
    return { column: columnReference(input.column), value: input.value }
}

/**
 * The intersection of a row and a column.
 *
 * {@link setValue} writes through to Coda and updates the local copy, but Coda
 * applies writes asynchronously: the local value is only representative until
 * the row is refreshed.
 */
export class Cell {
    constructor(
        readonly row: Row,
        readonly column: Column,
        private current: CellValue
    ) {}

    get value(): CellValue {
        return this.current
    }

    get name(): string {
        return this.column.name
    }

    async setValue(value: CellValue): Promise<WriteAcknowledgment> {
        const ack = await this.row.setCellValue(this.column, value)
        this.current = value
        return ack
    }

    toString(): string {
        return `Cell(${this.column.name}=${JSON.stringify(this.current)})`
    }
}
