import { config as loadEnv } from 'dotenv'
import { z } from 'zod'

import { ConfigurationError } from '../errors.js'

if (typeof process !== 'undefined' && process.versions?.node) {
    loadEnv()
}

export const DEFAULT_ENDPOINT = 'https://coda.io/apis/v1beta1'
export const DEFAULT_TIMEOUT_MS = 20000
export const DEFAULT_MAX_RETRIES = 3

// Unset and empty values are treated alike
const optionalString = z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : undefined))

const optionalInt = (min: number) =>
    z
        .string()
        .optional()
        .transform((v) => (v && v.trim() ? Number(v) : undefined))
        .pipe(z.number().int().min(min).optional())

const EnvSchema = z.object({
    CODA_API_KEY: optionalString,
    CODA_API_ENDPOINT: optionalString.pipe(z.string().url().optional()),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    HTTP_TIMEOUT_MS: optionalInt(1),
    CODA_MAX_RETRIES: optionalInt(0),
})

export type Env = z.infer<typeof EnvSchema>

type EnvOverrides = Partial<Record<keyof Env, string>>

let overrides: Record<string, string> | undefined

function buildEnvSource(): Record<string, string | undefined> {
    const base = typeof process !== 'undefined' && process.env ? { ...process.env } : {}
    return overrides ? { ...base, ...overrides } : base
}

export function setEnvOverrides(values: EnvOverrides | undefined): void {
    if (!values) return
    overrides = overrides ?? {}
    for (const [key, value] of Object.entries(values)) {
        if (typeof value === 'string') {
            overrides[key] = value
        } else if (value === undefined) {
            delete overrides[key]
        }
    }
}

export function clearEnvOverrides(): void {
    overrides = undefined
}

function formatIssues(error: z.ZodError): string {
    return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n')
}

export function getEnv(): Env {
    const parsed = EnvSchema.safeParse(buildEnvSource())
    if (!parsed.success) {
        throw new ConfigurationError(
            'ERR_INVALID_CONFIG',
            `Invalid environment configuration:\n${formatIssues(parsed.error)}`
        )
    }
    return parsed.data
}

const ClientConfigSchema = z.object({
    apiKey: z.string().min(1),
    endpoint: z
        .string()
        .url()
        .transform((v) => v.replace(/\/+$/, '')),
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().min(0),
})

/** Settings a {@link CodaClient} is built from. */
export type CodaClientConfig = z.infer<typeof ClientConfigSchema>

/**
 * Layers explicit options over the environment and validates the result.
 * Called once per client; nothing below the client reads the environment.
 */
export function resolveClientConfig(options: Partial<CodaClientConfig> = {}): CodaClientConfig {
    const env = getEnv()
    const apiKey = options.apiKey ?? env.CODA_API_KEY
    if (!apiKey) {
        throw new ConfigurationError('ERR_NO_API_KEY', 'No API key given and CODA_API_KEY is not set')
    }
    const parsed = ClientConfigSchema.safeParse({
        apiKey,
        endpoint: options.endpoint ?? env.CODA_API_ENDPOINT ?? DEFAULT_ENDPOINT,
        timeoutMs: options.timeoutMs ?? env.HTTP_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
        maxRetries: options.maxRetries ?? env.CODA_MAX_RETRIES ?? DEFAULT_MAX_RETRIES,
    })
    if (!parsed.success) {
        throw new ConfigurationError('ERR_INVALID_CONFIG', `Invalid client configuration:\n${formatIssues(parsed.error)}`)
    }
    return parsed.data
}
