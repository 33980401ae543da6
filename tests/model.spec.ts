import { http, HttpResponse } from 'msw'
import { describe, expect, it } from 'vitest'

import {
    AmbiguousReferenceError,
    InvalidFilterError,
    NotFoundError,
    RemoteRejectionError,
} from '../src/errors.js'
import type { Table } from '../src/model/table.js'
import { COLUMNS, docJson, rowJson, tableJson } from './helpers/fixtures.js'
import { BASE, DOC, makeClient, server, TABLE, useApiServer } from './helpers/server.js'

useApiServer()

async function openTable(): Promise<Table> {
    server.use(http.get(TABLE, () => HttpResponse.json(tableJson('grid-1', 'Tasks'))))
    return makeClient().document('doc-1').getTable('grid-1')
}

function serveColumns(columns: Record<string, unknown> = COLUMNS): { calls: number } {
    const counter = { calls: 0 }
    server.use(
        http.get(`${TABLE}/columns`, () => {
            counter.calls += 1
            return HttpResponse.json(columns)
        })
    )
    return counter
}

function serveRows(rows: Array<Record<string, unknown>>): { calls: number; params: URLSearchParams[] } {
    const seen = { calls: 0, params: new Array<URLSearchParams>() }
    server.use(
        http.get(`${TABLE}/rows`, ({ request }) => {
            seen.calls += 1
            seen.params.push(new URL(request.url).searchParams)
            return HttpResponse.json({ items: rows })
        })
    )
    return seen
}

const FIRST = rowJson('i-1', 'First', { 'c-1': 'x', 'c-2': 2 }, 0)
const SECOND = rowJson('i-2', 'Second', { 'c-1': 'y', 'c-2': 3 }, 1)

describe('Document', () => {
    it('fetches metadata on first access only', async () => {
        let calls = 0
        server.use(
            http.get(DOC, () => {
                calls += 1
                return HttpResponse.json(docJson())
            })
        )
        const doc = makeClient().document('doc-1')
        expect(calls).toBe(0)
        expect(await doc.name()).toBe('Roadmap')
        expect(await doc.owner()).toBe('owner@example.com')
        expect(calls).toBe(1)
        expect(String(doc)).toBe('Document(Roadmap)')
        await doc.refresh()
        expect(calls).toBe(2)
    })

    it('reports a missing document as not found', async () => {
        server.use(http.get(DOC, () => HttpResponse.json({ message: 'Not found' }, { status: 404 })))
        const error = await makeClient()
            .document('doc-1')
            .metadata()
            .catch((e: unknown) => e)
        expect(error).toBeInstanceOf(NotFoundError)
        expect(error).toMatchObject({ code: 'ERR_REFERENCE_NOT_FOUND', message: 'No document matches "doc-1"' })
    })

    it('reuses listing data for documents', async () => {
        server.use(http.get(`${BASE}/docs`, () => HttpResponse.json({ items: [docJson('doc-1'), docJson('doc-2', 'Budget')] })))
        const docs = await makeClient().documents({ limit: 5 })
        expect(docs.map((d) => d.id)).toEqual(['doc-1', 'doc-2'])
        expect(await docs[1].name()).toBe('Budget')
    })

    it('resolves a table by unique name', async () => {
        server.use(
            http.get(`${DOC}/tables`, () =>
                HttpResponse.json({ items: [tableJson('grid-1', 'Tasks'), tableJson('grid-2', 'People')] })
            )
        )
        const table = await makeClient().document('doc-1').getTable('People')
        expect(table.id).toBe('grid-2')
        expect(table.isView).toBe(false)
    })

    it('refuses a table name shared by several tables', async () => {
        server.use(
            http.get(`${DOC}/tables`, () =>
                HttpResponse.json({ items: [tableJson('grid-1', 'Tasks'), tableJson('grid-2', 'Tasks')] })
            )
        )
        const error = await makeClient()
            .document('doc-1')
            .getTable('Tasks')
            .catch((e: unknown) => e)
        expect(error).toBeInstanceOf(AmbiguousReferenceError)
        expect(error).toMatchObject({ message: '2 tables match "Tasks": grid-1, grid-2' })
    })

    it('reports an unknown table name', async () => {
        server.use(http.get(`${DOC}/tables`, () => HttpResponse.json({ items: [tableJson('grid-1', 'Tasks')] })))
        await expect(makeClient().document('doc-1').getTable('Nope')).rejects.toThrow('No table matches "Nope"')
    })

    it('fetches id-shaped table references directly', async () => {
        const table = await openTable()
        expect(table.name).toBe('Tasks')
        expect(String(table)).toBe('Table(Tasks)')
    })

    it('turns a 404 on a table id into not found', async () => {
        server.use(http.get(`${DOC}/tables/grid-missing`, () => HttpResponse.json({}, { status: 404 })))
        await expect(makeClient().document('doc-1').getTable('grid-missing')).rejects.toBeInstanceOf(NotFoundError)
    })

    it('marks views as such', async () => {
        server.use(http.get(`${DOC}/views`, () => HttpResponse.json({ items: [{ id: 'table-9', name: 'Open tasks' }] })))
        const [view] = await makeClient().document('doc-1').listViews()
        expect(view.isView).toBe(true)
        expect(view.type).toBe('view')
    })
})

describe('Table', () => {
    it('memoizes columns until refreshed', async () => {
        const table = await openTable()
        const served = serveColumns()
        const columns = await table.columns()
        expect(columns.map((c) => c.name)).toEqual(['Col A', 'Col B'])
        expect((await table.getColumn('Col B')).id).toBe('c-2')
        expect((await table.getColumn('c-1')).name).toBe('Col A')
        expect(served.calls).toBe(1)
        await table.refreshColumns()
        expect(served.calls).toBe(2)
    })

    it('fetches table details once', async () => {
        const table = await openTable()
        let calls = 0
        server.use(
            http.get(TABLE, () => {
                calls += 1
                return HttpResponse.json({ ...tableJson('grid-1', 'Tasks'), rowCount: 2 })
            })
        )
        expect((await table.getDetails()).rowCount).toBe(2)
        expect((await table.getDetails()).rowCount).toBe(2)
        expect(calls).toBe(1)
    })

    it('filters by column id without quoting it', async () => {
        const table = await openTable()
        const served = serveRows([FIRST])
        const row = await table.findRowByColumnValue('c-1', 'x')
        expect(row?.id).toBe('i-1')
        expect(served.params[0].get('query')).toBe('c-1:"x"')
        expect(served.params[0].get('limit')).toBe('1')
    })

    it('quotes column names in filters and returns every match', async () => {
        const table = await openTable()
        const served = serveRows([FIRST, SECOND])
        const rows = await table.findRowsByColumnValue('Col A', 'x')
        expect(rows.map((r) => r.name)).toEqual(['First', 'Second'])
        expect(served.params[0].get('query')).toBe('"Col A":"x"')
        expect(served.params[0].get('limit')).toBeNull()
    })

    it('filters by a column object through its id', async () => {
        const table = await openTable()
        serveColumns()
        const served = serveRows([])
        const column = await table.getColumn('Col B')
        expect(await table.findRowByColumnValue(column, 3)).toBeUndefined()
        expect(served.params[0].get('query')).toBe('c-2:3')
    })

    it('rejects a filter combined with a raw query', async () => {
        const table = await openTable()
        await expect(table.rows({ filter: { column: 'c-1', value: 'x' }, query: 'c-2:3' })).rejects.toBeInstanceOf(
            InvalidFilterError
        )
        await expect(table.rows({ filter: { column: '', value: 'x' } })).rejects.toBeInstanceOf(InvalidFilterError)
    })

    it('iterates a fresh snapshot on every pass', async () => {
        const table = await openTable()
        const served = serveRows([FIRST, SECOND])
        const names: string[] = []
        for await (const row of table.iterateRows()) names.push(row.name)
        for await (const row of table.iterateRows()) names.push(row.name)
        expect(names).toEqual(['First', 'Second', 'First', 'Second'])
        expect(served.calls).toBe(2)
    })

    it('resolves rows by id and by display name', async () => {
        const table = await openTable()
        server.use(http.get(`${TABLE}/rows/i-2`, () => HttpResponse.json(SECOND)))
        serveRows([FIRST, SECOND])
        expect((await table.getRow('i-2')).name).toBe('Second')
        expect((await table.getRow('First')).id).toBe('i-1')
        await expect(table.getRow('Third')).rejects.toThrow('No row matches "Third"')
    })

    it('reports a missing row id as not found', async () => {
        const table = await openTable()
        server.use(http.get(`${TABLE}/rows/i-missing`, () => HttpResponse.json({}, { status: 404 })))
        const error = await table.getRow('i-missing').catch((e: unknown) => e)
        expect(error).toBeInstanceOf(NotFoundError)
        expect(error).toMatchObject({ cause: expect.any(RemoteRejectionError) })
    })
})

describe('Row and Cell', () => {
    it('lists cells in column order', async () => {
        const table = await openTable()
        serveColumns()
        serveRows([rowJson('i-1', 'First', { 'c-2': 2, 'c-1': 'x' })])
        const [row] = await table.rows()
        const cells = await row.cells()
        expect(cells.map((c) => [c.name, c.value])).toEqual([
            ['Col A', 'x'],
            ['Col B', 2],
        ])
    })

    it('looks up cells by name, id or column', async () => {
        const table = await openTable()
        serveColumns()
        serveRows([FIRST])
        const [row] = await table.rows()
        expect((await row.getCell('Col B')).value).toBe(2)
        expect((await row.getCell('c-1')).value).toBe('x')
        const column = await table.getColumn('Col A')
        expect((await row.getCell(column)).value).toBe('x')
        expect(await row.lookupCell('Col C')).toEqual({ kind: 'not_found', reference: 'Col C' })
        await expect(row.getCell('Col C')).rejects.toBeInstanceOf(NotFoundError)
    })

    it('refuses a column name shared by several columns', async () => {
        const table = await openTable()
        serveColumns({
            items: [
                { id: 'c-1', name: 'Status' },
                { id: 'c-2', name: 'Status' },
            ],
        })
        serveRows([FIRST])
        const [row] = await table.rows()
        const error = await row.getCell('Status').catch((e: unknown) => e)
        expect(error).toBeInstanceOf(AmbiguousReferenceError)
        expect(error).toMatchObject({ message: '2 columns match "Status": c-1, c-2' })
    })

    it('shows an upserted value only after refresh', async () => {
        const table = await openTable()
        let stored = rowJson('i-1', 'First', { 'c-1': 'x', 'c-2': 2 })
        let body: unknown
        server.use(
            http.get(`${TABLE}/rows/i-1`, () => HttpResponse.json(stored)),
            http.post(`${TABLE}/rows`, async ({ request }) => {
                body = await request.json()
                stored = rowJson('i-1', 'First', { 'c-1': 'x', 'c-2': 9 })
                return HttpResponse.json({ requestId: 'mutate:1' }, { status: 202 })
            })
        )
        const row = await table.getRow('i-1')
        const ack = await table.upsertRow([{ column: 'c-1', value: 'x' }, { column: 'Col B', value: 9 }], { keyColumns: ['c-1'] })
        expect(ack).toEqual({ status: 202, requestId: 'mutate:1' })
        expect(body).toEqual({
            rows: [{ cells: [{ column: 'c-1', value: 'x' }, { column: 'Col B', value: 9 }] }],
            keyColumns: ['c-1'],
        })
        expect(row.values['c-2']).toBe(2)
        await row.refresh()
        expect(row.values['c-2']).toBe(9)
    })

    it('writes a cell through to its row', async () => {
        const table = await openTable()
        serveColumns()
        serveRows([FIRST])
        let body: unknown
        server.use(
            http.put(`${TABLE}/rows/i-1`, async ({ request }) => {
                body = await request.json()
                return HttpResponse.json({ id: 'i-1', requestId: 'mutate:2' }, { status: 202 })
            })
        )
        const [row] = await table.rows()
        const cell = await row.getCell('Col B')
        const ack = await cell.setValue(5)
        expect(ack.status).toBe(202)
        expect(body).toEqual({ row: { cells: [{ column: 'c-2', value: 5 }] } })
        expect(cell.value).toBe(5)
        expect(row.values['c-2']).toBe(5)
    })

    it('keeps a name-addressed update locally once columns are known', async () => {
        const table = await openTable()
        serveColumns()
        serveRows([FIRST])
        server.use(http.put(`${TABLE}/rows/i-1`, () => new HttpResponse(null, { status: 202 })))
        await table.columns()
        const [row] = await table.rows()
        await row.update([{ column: 'Col A', value: 'z' }])
        expect(row.values['c-1']).toBe('z')
    })

    it('deletes a row, and rejects deleting it twice', async () => {
        const table = await openTable()
        serveRows([FIRST])
        let deleted = false
        server.use(
            http.delete(`${TABLE}/rows/i-1`, () => {
                if (deleted) return HttpResponse.json({ message: 'Row not found' }, { status: 404 })
                deleted = true
                return HttpResponse.json({ id: 'i-1', requestId: 'mutate:3' }, { status: 202 })
            })
        )
        const [row] = await table.rows()
        expect(await row.delete()).toEqual({ status: 202, id: 'i-1', requestId: 'mutate:3' })
        const error = await row.delete().catch((e: unknown) => e)
        expect(error).toBeInstanceOf(RemoteRejectionError)
        expect(error).toMatchObject({ status: 404, code: 'ERR_NOT_FOUND' })
    })
})
