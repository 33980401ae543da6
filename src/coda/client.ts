import axios, { type AxiosError, type AxiosInstance, type InternalAxiosRequestConfig, type Method } from 'axios'
import axiosRetry from 'axios-retry'
import type { z } from 'zod'

import { type CodaClientConfig, resolveClientConfig } from '../config/env.js'
import { toCodedAxiosError, TransportFailureError } from '../errors.js'
import { withRequest } from '../logger.js'
import { Document } from '../model/document.js'
import {
    type Account,
    AccountSchema,
    type ColumnData,
    ColumnSchema,
    type Control,
    ControlSchema,
    type Doc,
    DocSchema,
    type Folder,
    FolderSchema,
    type Formula,
    FormulaSchema,
    pageOf,
    type ResolvedBrowserLink,
    ResolvedBrowserLinkSchema,
    type RowData,
    RowSchema,
    type Section,
    SectionSchema,
    type TableData,
    TableSchema,
    WriteResultSchema,
} from '../schema/api.js'
import { collectPages } from './pagination.js'
import type {
    CreateDocOptions,
    GetRowOptions,
    JsonObject,
    ListDocsOptions,
    ListRowsOptions,
    Page,
    PageOptions,
    QueryParams,
    RowPayload,
    StatusDescriptor,
    UpsertRowsOptions,
    WriteAcknowledgment,
} from './types.js'
import { apiPath, isJsonObject, isRateLimited, logAxiosError } from './utils.js'

export type GetParams = QueryParams & PageOptions

interface RawResponse {
    status: number
    body: JsonObject | undefined
}

function retryAfterMs(error: AxiosError): number | undefined {
    const header: unknown = error.response?.headers?.['retry-after']
    const seconds = typeof header === 'string' || typeof header === 'number' ? Number(header) : NaN
    return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined
}

/**
 * HTTP client for the Coda API.
 *
 * The four verbs are the whole transport: they attach the bearer token,
 * page through listings, and turn failures into {@link RemoteRejectionError}
 * or {@link TransportFailureError}. The endpoint methods below them add
 * response validation and nothing else.
 */
export class CodaClient {
    readonly endpoint: string
    private readonly http: AxiosInstance

    constructor(options: Partial<CodaClientConfig> = {}) {
        const config = resolveClientConfig(options)
        this.endpoint = config.endpoint
        this.http = axios.create({
            baseURL: config.endpoint,
            timeout: config.timeoutMs,
            headers: {
                Authorization: `Bearer ${config.apiKey}`,
                Accept: 'application/json',
            },
            validateStatus: (status) => status >= 200 && status < 400,
        })

        const addMeta = (cfg: InternalAxiosRequestConfig) => {
            cfg.metadata = {
                requestId: cfg.metadata?.requestId ?? Math.random().toString(36).slice(2),
                startedAt: Date.now(),
                op: cfg.op ?? `${cfg.method ?? 'get'} ${cfg.url ?? ''}`,
            }
            return cfg
        }
        this.http.interceptors.request.use(addMeta)
        this.http.interceptors.response.use((res) => {
            const meta = res.config.metadata
            withRequest({ request_id: meta?.requestId, op: meta?.op }).debug(
                {
                    method: res.config.method,
                    url: res.config.url,
                    status: res.status,
                    duration_ms: meta ? Date.now() - meta.startedAt : undefined,
                },
                'Coda API request'
            )
            return res
        })

        // Only rate-limit answers are retried; everything else surfaces at once.
        axiosRetry(this.http, {
            retries: config.maxRetries,
            retryCondition: isRateLimited,
            retryDelay: (retryCount, error) => retryAfterMs(error) ?? axiosRetry.exponentialDelay(retryCount),
        })
    }

    static fromEnvironment(): CodaClient {
        return new CodaClient()
    }

    // --- Transport ---

    private async send(method: Method, path: string, op: string, opts: { params?: QueryParams; data?: unknown } = {}): Promise<RawResponse> {
        try {
            const res = await this.http.request<unknown>({ method, url: path, params: opts.params, data: opts.data, op })
            return { status: res.status, body: isJsonObject(res.data) ? res.data : undefined }
        } catch (error) {
            logAxiosError(error, op)
            throw toCodedAxiosError(error, op)
        }
    }

    // A 2xx answer without a JSON object body becomes a StatusDescriptor
    private static unwrap({ status, body }: RawResponse): JsonObject {
        const descriptor: StatusDescriptor = { status }
        return body ?? { ...descriptor }
    }

    /**
     * GET with transparent pagination. Without `limit` all pages are merged;
     * with it, no more pages are requested than needed to fill it.
     */
    async get(path: string, params: GetParams = {}, op = `GET ${path}`): Promise<JsonObject> {
        const { limit, pageToken, ...rest } = params
        return collectPages(
            async (token, remaining) => {
                const res = await this.send('GET', path, op, { params: { ...rest, limit: remaining, pageToken: token } })
                return CodaClient.unwrap(res)
            },
            { limit, pageToken, op }
        )
    }

    async post(path: string, body: unknown, op = `POST ${path}`): Promise<JsonObject> {
        return CodaClient.unwrap(await this.send('POST', path, op, { data: body }))
    }

    async put(path: string, body: unknown, op = `PUT ${path}`): Promise<JsonObject> {
        return CodaClient.unwrap(await this.send('PUT', path, op, { data: body }))
    }

    async delete(path: string, body?: unknown, op = `DELETE ${path}`): Promise<JsonObject> {
        return CodaClient.unwrap(await this.send('DELETE', path, op, { data: body }))
    }

    private decode<T extends z.ZodTypeAny>(schema: T, value: unknown, op: string): z.output<T> {
        const parsed = schema.safeParse(value)
        if (!parsed.success) {
            const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
            throw new TransportFailureError('ERR_MALFORMED_RESPONSE', `Unexpected response for ${op}: ${issues}`, op, parsed.error)
        }
        return parsed.data
    }

    private async write(method: Method, path: string, op: string, data?: unknown): Promise<WriteAcknowledgment> {
        const { status, body } = await this.send(method, path, op, { data })
        return { status, ...this.decode(WriteResultSchema, body ?? {}, op) }
    }

    // --- Account ---

    async whoami(): Promise<Account> {
        return this.decode(AccountSchema, await this.get('/whoami', {}, 'whoami'), 'whoami')
    }

    async resolveBrowserLink(url: string, degradeGracefully = false): Promise<ResolvedBrowserLink> {
        const op = 'resolveBrowserLink'
        return this.decode(ResolvedBrowserLinkSchema, await this.get('/resolveBrowserLink', { url, degradeGracefully }, op), op)
    }

    // --- Docs ---

    async listDocs(options: ListDocsOptions = {}): Promise<Page<Doc>> {
        const { limit, pageToken, isOwner, query, sourceDoc } = options
        const res = await this.get('/docs', { limit, pageToken, isOwner, query, sourceDoc }, 'listDocs')
        return this.decode(pageOf(DocSchema), res, 'listDocs')
    }

    async getDoc(docId: string): Promise<Doc> {
        return this.decode(DocSchema, await this.get(apiPath('docs', docId), {}, 'getDoc'), 'getDoc')
    }

    async createDoc(title: string, options: CreateDocOptions = {}): Promise<Doc> {
        const res = await this.post('/docs', { title, ...options }, 'createDoc')
        return this.decode(DocSchema, res, 'createDoc')
    }

    async deleteDoc(docId: string): Promise<WriteAcknowledgment> {
        return this.write('DELETE', apiPath('docs', docId), 'deleteDoc')
    }

    /** A lazily populated view of a document; issues no request. */
    document(docId: string): Document {
        return new Document(this, docId)
    }

    async documents(options: ListDocsOptions = {}): Promise<Document[]> {
        const page = await this.listDocs(options)
        return page.items.map((doc) => new Document(this, doc.id, doc))
    }

    // --- Sections and folders ---

    async listSections(docId: string, options: PageOptions = {}): Promise<Page<Section>> {
        const res = await this.get(apiPath('docs', docId, 'sections'), { ...options }, 'listSections')
        return this.decode(pageOf(SectionSchema), res, 'listSections')
    }

    async getSection(docId: string, sectionIdOrName: string): Promise<Section> {
        const res = await this.get(apiPath('docs', docId, 'sections', sectionIdOrName), {}, 'getSection')
        return this.decode(SectionSchema, res, 'getSection')
    }

    async listFolders(docId: string, options: PageOptions = {}): Promise<Page<Folder>> {
        const res = await this.get(apiPath('docs', docId, 'folders'), { ...options }, 'listFolders')
        return this.decode(pageOf(FolderSchema), res, 'listFolders')
    }

    async getFolder(docId: string, folderIdOrName: string): Promise<Folder> {
        const res = await this.get(apiPath('docs', docId, 'folders', folderIdOrName), {}, 'getFolder')
        return this.decode(FolderSchema, res, 'getFolder')
    }

    // --- Tables and views ---

    async listTables(docId: string, options: PageOptions = {}): Promise<Page<TableData>> {
        const res = await this.get(apiPath('docs', docId, 'tables'), { ...options }, 'listTables')
        return this.decode(pageOf(TableSchema), res, 'listTables')
    }

    async getTable(docId: string, tableIdOrName: string): Promise<TableData> {
        const res = await this.get(apiPath('docs', docId, 'tables', tableIdOrName), {}, 'getTable')
        return this.decode(TableSchema, res, 'getTable')
    }

    async listViews(docId: string, options: PageOptions = {}): Promise<Page<TableData>> {
        const res = await this.get(apiPath('docs', docId, 'views'), { ...options }, 'listViews')
        return this.decode(pageOf(TableSchema), res, 'listViews')
    }

    async getView(docId: string, viewIdOrName: string): Promise<TableData> {
        const res = await this.get(apiPath('docs', docId, 'views', viewIdOrName), {}, 'getView')
        return this.decode(TableSchema, res, 'getView')
    }

    // --- Columns ---

    async listColumns(docId: string, tableIdOrName: string, options: PageOptions = {}): Promise<Page<ColumnData>> {
        const res = await this.get(apiPath('docs', docId, 'tables', tableIdOrName, 'columns'), { ...options }, 'listColumns')
        return this.decode(pageOf(ColumnSchema), res, 'listColumns')
    }

    async getColumn(docId: string, tableIdOrName: string, columnIdOrName: string): Promise<ColumnData> {
        const res = await this.get(apiPath('docs', docId, 'tables', tableIdOrName, 'columns', columnIdOrName), {}, 'getColumn')
        return this.decode(ColumnSchema, res, 'getColumn')
    }

    // --- Rows ---

    async listRows(docId: string, tableIdOrName: string, options: ListRowsOptions = {}): Promise<Page<RowData>> {
        const { useColumnNames = false, ...rest } = options
        const res = await this.get(apiPath('docs', docId, 'tables', tableIdOrName, 'rows'), { ...rest, useColumnNames }, 'listRows')
        return this.decode(pageOf(RowSchema), res, 'listRows')
    }

    async getRow(docId: string, tableIdOrName: string, rowIdOrName: string, options: GetRowOptions = {}): Promise<RowData> {
        const { useColumnNames = false, valueFormat } = options
        const res = await this.get(
            apiPath('docs', docId, 'tables', tableIdOrName, 'rows', rowIdOrName),
            { useColumnNames, valueFormat },
            'getRow'
        )
        return this.decode(RowSchema, res, 'getRow')
    }

    /** Inserts rows, or updates the rows matching `keyColumns`, in one request. */
    async upsertRows(docId: string, tableIdOrName: string, rows: RowPayload[], options: UpsertRowsOptions = {}): Promise<WriteAcknowledgment> {
        const body = options.keyColumns?.length ? { rows, keyColumns: options.keyColumns } : { rows }
        return this.write('POST', apiPath('docs', docId, 'tables', tableIdOrName, 'rows'), 'upsertRows', body)
    }

    async updateRow(docId: string, tableIdOrName: string, rowIdOrName: string, row: RowPayload): Promise<WriteAcknowledgment> {
        return this.write('PUT', apiPath('docs', docId, 'tables', tableIdOrName, 'rows', rowIdOrName), 'updateRow', { row })
    }

    async deleteRow(docId: string, tableIdOrName: string, rowIdOrName: string): Promise<WriteAcknowledgment> {
        return this.write('DELETE', apiPath('docs', docId, 'tables', tableIdOrName, 'rows', rowIdOrName), 'deleteRow')
    }

    // --- Formulas and controls ---

    async listFormulas(docId: string, options: PageOptions = {}): Promise<Page<Formula>> {
        const res = await this.get(apiPath('docs', docId, 'formulas'), { ...options }, 'listFormulas')
        return this.decode(pageOf(FormulaSchema), res, 'listFormulas')
    }

    async getFormula(docId: string, formulaIdOrName: string): Promise<Formula> {
        const res = await this.get(apiPath('docs', docId, 'formulas', formulaIdOrName), {}, 'getFormula')
        return this.decode(FormulaSchema, res, 'getFormula')
    }

    async listControls(docId: string, options: PageOptions = {}): Promise<Page<Control>> {
        const res = await this.get(apiPath('docs', docId, 'controls'), { ...options }, 'listControls')
        return this.decode(pageOf(ControlSchema), res, 'listControls')
    }

    async getControl(docId: string, controlIdOrName: string): Promise<Control> {
        const res = await this.get(apiPath('docs', docId, 'controls', controlIdOrName), {}, 'getControl')
        return this.decode(ControlSchema, res, 'getControl')
    }
}
