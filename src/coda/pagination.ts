import { TransportFailureError } from '../errors.js'
import type { JsonObject } from './types.js'

/** Fetches one page. `limit` is the number of items still wanted, if bounded. */
export type PageFetcher = (pageToken: string | undefined, limit: number | undefined) => Promise<JsonObject>

export interface CollectOptions {
    limit?: number
    pageToken?: string
    op: string
}

function itemsOf(page: JsonObject): unknown[] | undefined {
    return Array.isArray(page.items) ? page.items : undefined
}

function nextTokenOf(page: JsonObject): string | undefined {
    const token = page.nextPageToken
    return typeof token === 'string' && token ? token : undefined
}

/**
 * Walks a listing page by page and returns one merged result.
 *
 * Without a limit every advertised page is fetched. With a limit, fetching
 * stops as soon as enough items are in hand and the result is cut to exactly
 * `limit` items; a limit of zero or less makes no request at all and yields
 * an empty listing. Responses without an `items` array are returned untouched.
 */
export async function collectPages(fetchPage: PageFetcher, opts: CollectOptions): Promise<JsonObject> {
    const { limit, op } = opts
    // The API rejects limits below 1
    if (limit !== undefined && limit <= 0) return { items: [] }
    const first = await fetchPage(opts.pageToken, limit)
    const firstItems = itemsOf(first)
    if (!firstItems) return first

    const items = [...firstItems]
    let next = nextTokenOf(first)
    while (next && (limit === undefined || items.length < limit)) {
        const page = await fetchPage(next, limit === undefined ? undefined : limit - items.length)
        const pageItems = itemsOf(page)
        if (!pageItems) {
            throw new TransportFailureError('ERR_MALFORMED_RESPONSE', 'Follow-up page has no items array', op)
        }
        items.push(...pageItems)
        next = nextTokenOf(page)
    }

    const { nextPageToken: _token, nextPageLink: _link, ...rest } = first
    return { ...rest, items: limit === undefined ? items : items.slice(0, limit) }
}
