export { CodaClient, type GetParams } from './coda/client.js'
export type {
    CellPayload,
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
    ValueFormat,
    WriteAcknowledgment,
} from './coda/types.js'
export { formatRowQuery, looksLikeId } from './coda/utils.js'
export {
    clearEnvOverrides,
    type CodaClientConfig,
    DEFAULT_ENDPOINT,
    getEnv,
    resolveClientConfig,
    setEnvOverrides,
} from './config/env.js'
export {
    AmbiguousReferenceError,
    CodaError,
    ConfigurationError,
    type ErrorCode,
    InvalidFilterError,
    isCodaError,
    NotFoundError,
    type ReferenceKind,
    RemoteRejectionError,
    toCodedAxiosError,
    TransportFailureError,
} from './errors.js'
export { logger } from './logger.js'
export { Cell, type CellInput, toCellPayload } from './model/cell.js'
export { Column } from './model/column.js'
export { Document } from './model/document.js'
export { Lazy, type LazyState } from './model/lazy.js'
export type { Lookup } from './model/resolve.js'
export { type CellLookup, Row } from './model/row.js'
export { type RowFilter, type RowListingOptions, Table, type TableUpsertOptions } from './model/table.js'
export type {
    Account,
    CellValue,
    ColumnData,
    Control,
    Doc,
    Folder,
    Formula,
    ResolvedBrowserLink,
    RowData,
    Section,
    TableData,
} from './schema/api.js'
