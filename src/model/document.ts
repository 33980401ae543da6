import { CodaClient } from '../coda/client.js'
import type { WriteAcknowledgment } from '../coda/types.js'
import { looksLikeId } from '../coda/utils.js'
import { isNotFoundRejection, NotFoundError } from '../errors.js'
import type { Control, Doc, Folder, Formula, Section, TableData } from '../schema/api.js'
import { Lazy } from './lazy.js'
import { expectFound, lookup } from './resolve.js'
import { Table } from './table.js'

/**
 * A Coda doc. Metadata is fetched on first access and memoized; table
 * listings are fetched fresh on every call.
 */
export class Document {
    private readonly meta: Lazy<Doc>

    constructor(
        readonly client: CodaClient,
        readonly id: string,
        data?: Doc
    ) {
        this.meta = Lazy.of(async () => {
            try {
                return await this.client.getDoc(this.id)
            } catch (error) {
                if (isNotFoundRejection(error)) throw new NotFoundError('document', this.id, error)
                throw error
            }
        }, data)
    }

    /** A document on a client configured from the environment (`CODA_API_KEY`). */
    static fromEnvironment(id: string): Document {
        return CodaClient.fromEnvironment().document(id)
    }

    async metadata(): Promise<Doc> {
        return this.meta.ensureLoaded()
    }

    async refresh(): Promise<Doc> {
        return this.meta.refresh()
    }

    async name(): Promise<string> {
        return (await this.metadata()).name
    }

    async owner(): Promise<string> {
        return (await this.metadata()).owner
    }

    async browserLink(): Promise<string> {
        return (await this.metadata()).browserLink
    }

    async listTables(): Promise<Table[]> {
        const page = await this.client.listTables(this.id)
        return page.items.map((t) => new Table(this, t))
    }

    async listViews(): Promise<Table[]> {
        const page = await this.client.listViews(this.id)
        return page.items.map((t) => new Table(this, { ...t, type: t.type ?? 'view' }))
    }

    private async fetchTable(kind: 'table' | 'view', id: string): Promise<Table> {
        try {
            const data: TableData =
                kind === 'table' ? await this.client.getTable(this.id, id) : await this.client.getView(this.id, id)
            return new Table(this, kind === 'view' ? { ...data, type: data.type ?? 'view' } : data)
        } catch (error) {
            if (isNotFoundRejection(error)) throw new NotFoundError(kind, id, error)
            throw error
        }
    }

    /**
     * Resolves a table by id, or by name when the reference is not id-shaped.
     * Table names can be shared or changed, so a name matching several
     * tables is an {@link AmbiguousReferenceError}.
     */
    async getTable(reference: string): Promise<Table> {
        if (looksLikeId('table', reference)) return this.fetchTable('table', reference)
        return expectFound('table', lookup(reference, await this.listTables(), false))
    }

    async getView(reference: string): Promise<Table> {
        if (looksLikeId('view', reference)) return this.fetchTable('view', reference)
        return expectFound('view', lookup(reference, await this.listViews(), false))
    }

    async listSections(): Promise<Section[]> {
        return (await this.client.listSections(this.id)).items
    }

    async getSection(idOrName: string): Promise<Section> {
        return this.client.getSection(this.id, idOrName)
    }

    async listFolders(): Promise<Folder[]> {
        return (await this.client.listFolders(this.id)).items
    }

    async getFolder(idOrName: string): Promise<Folder> {
        return this.client.getFolder(this.id, idOrName)
    }

    async listFormulas(): Promise<Formula[]> {
        return (await this.client.listFormulas(this.id)).items
    }

    async getFormula(idOrName: string): Promise<Formula> {
        return this.client.getFormula(this.id, idOrName)
    }

    async listControls(): Promise<Control[]> {
        return (await this.client.listControls(this.id)).items
    }

    async getControl(idOrName: string): Promise<Control> {
        return this.client.getControl(this.id, idOrName)
    }

    async delete(): Promise<WriteAcknowledgment> {
        return this.client.deleteDoc(this.id)
    }

    toString(): string {
        const name = this.meta.peek()?.name
        return name ? `Document(${name})` : `Document(${this.id})`
    }
}
