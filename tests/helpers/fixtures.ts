import type { CellValue } from '../../src/schema/api.js'

export function docJson(id = 'doc-1', name = 'Roadmap') {
    return {
        id,
        type: 'doc',
        href: `https://coda.test/apis/v1beta1/docs/${id}`,
        browserLink: `https://coda.test/d/_d${id}`,
        name,
        owner: 'owner@example.com',
        createdAt: '2024-01-02T03:04:05.000Z',
        updatedAt: '2024-02-03T04:05:06.000Z',
    }
}

export function tableJson(id: string, name: string) {
    return { id, type: 'table', name, href: `https://coda.test/apis/v1beta1/docs/doc-1/tables/${id}` }
}

export const COLUMNS = {
    items: [
        { id: 'c-1', name: 'Col A' },
        { id: 'c-2', name: 'Col B' },
    ],
}

export function rowJson(id: string, name: string, values: Record<string, CellValue>, index = 0) {
    return {
        id,
        type: 'row',
        name,
        index,
        browserLink: `https://coda.test/d/_ddoc-1#_r${id}`,
        createdAt: '2024-03-01T00:00:00.000Z',
        updatedAt: '2024-03-02T00:00:00.000Z',
        values,
    }
}
