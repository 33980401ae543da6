import { z } from 'zod'

// Shapes of Coda API responses. Decoding is lenient: only the fields the
// object model reads are required.

export type CellValue = string | number | boolean | null | CellValue[] | { [key: string]: CellValue }

export const CellValueSchema: z.ZodType<CellValue> = z.lazy(() =>
    z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(CellValueSchema), z.record(CellValueSchema)])
)

const Timestamp = z.coerce.date()

const ResourceFields = {
    id: z.string(),
    type: z.string().optional(),
    href: z.string().optional(),
}

export function pageOf<T extends z.ZodTypeAny>(item: T) {
    return z.object({
        items: z.array(item),
        href: z.string().optional(),
        nextPageToken: z.string().optional(),
        nextPageLink: z.string().optional(),
    })
}

export const AccountSchema = z.object({
    name: z.string(),
    loginId: z.string(),
    type: z.string().optional(),
    href: z.string().optional(),
    scoped: z.boolean().optional(),
    tokenName: z.string().optional(),
})
export type Account = z.infer<typeof AccountSchema>

export const ResolvedBrowserLinkSchema = z.object({
    type: z.string().optional(),
    href: z.string().optional(),
    browserLink: z.string(),
    resource: z.object({
        ...ResourceFields,
        type: z.string(),
        name: z.string().optional(),
    }),
})
export type ResolvedBrowserLink = z.infer<typeof ResolvedBrowserLinkSchema>

export const DocSchema = z.object({
    ...ResourceFields,
    name: z.string(),
    owner: z.string(),
    ownerName: z.string().optional(),
    browserLink: z.string(),
    createdAt: Timestamp,
    updatedAt: Timestamp,
})
export type Doc = z.infer<typeof DocSchema>

export const SectionSchema = z.object({
    ...ResourceFields,
    name: z.string(),
    browserLink: z.string().optional(),
})
export type Section = z.infer<typeof SectionSchema>

export const FolderSchema = z.object({
    ...ResourceFields,
    name: z.string(),
})
export type Folder = z.infer<typeof FolderSchema>

const ColumnRefSchema = z.object(ResourceFields)

export const TableSchema = z.object({
    ...ResourceFields,
    name: z.string(),
    browserLink: z.string().optional(),
    displayColumn: ColumnRefSchema.optional(),
    rowCount: z.number().int().optional(),
    createdAt: Timestamp.optional(),
    updatedAt: Timestamp.optional(),
})
export type TableData = z.infer<typeof TableSchema>

export const ColumnSchema = z.object({
    ...ResourceFields,
    name: z.string(),
    display: z.boolean().optional(),
    calculated: z.boolean().optional(),
    formula: z.string().optional(),
    format: z.record(z.unknown()).optional(),
})
export type ColumnData = z.infer<typeof ColumnSchema>

export const RowSchema = z.object({
    ...ResourceFields,
    name: z.string().optional(),
    index: z.number().int().optional(),
    browserLink: z.string().optional(),
    createdAt: Timestamp.optional(),
    updatedAt: Timestamp.optional(),
    values: z.record(CellValueSchema),
})
export type RowData = z.infer<typeof RowSchema>

export const FormulaSchema = z.object({
    ...ResourceFields,
    name: z.string(),
    value: CellValueSchema.optional(),
})
export type Formula = z.infer<typeof FormulaSchema>

export const ControlSchema = z.object({
    ...ResourceFields,
    name: z.string(),
    controlType: z.string().optional(),
    value: CellValueSchema.optional(),
})
export type Control = z.infer<typeof ControlSchema>

export const WriteResultSchema = z.object({
    id: z.string().optional(),
    requestId: z.string().optional(),
    addedRowIds: z.array(z.string()).optional(),
})
