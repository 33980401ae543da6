import { CodaClient } from '../src/coda/client.js'
import { isCodaError } from '../src/errors.js'

// Live check against a real account. Needs CODA_API_KEY; never run by `npm test`.
async function main() {
    const client = CodaClient.fromEnvironment()

    const account = await client.whoami()
    console.log('[smoke] whoami OK', { name: account.name, loginId: account.loginId })

    const docs = await client.documents({ limit: 5 })
    console.log('[smoke] docs', docs.length)

    const docId = process.env.CODA_SMOKE_DOC_ID
    if (!docId) return
    const doc = client.document(docId)
    console.log('[smoke] doc', await doc.name())
    for (const table of await doc.listTables()) {
        const columns = await table.columns()
        const rows = await table.rows({ limit: 3 })
        console.log('[smoke] table', { name: table.name, columns: columns.length, sample_rows: rows.length })
    }
}

main().catch((err: unknown) => {
    if (isCodaError(err)) console.error('[smoke] failed', err.code, err.message)
    else console.error('[smoke] failed', err)
    process.exit(1)
})
