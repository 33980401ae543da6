import { AmbiguousReferenceError, NotFoundError, type ReferenceKind } from '../errors.js'

export interface Named {
    id: string
    name: string
}

export type Lookup<T> =
    | { kind: 'found'; value: T }
    | { kind: 'not_found'; reference: string }
    | { kind: 'ambiguous'; reference: string; matches: T[] }

/**
 * Finds the single candidate a reference designates. Id-shaped references
 * match on id only; anything else matches on display name.
 */
export function lookup<T extends Named>(reference: string, candidates: readonly T[], isId: boolean): Lookup<T> {
    const matches = candidates.filter((c) => (isId ? c.id === reference : c.name === reference))
    if (matches.length === 1) return { kind: 'found', value: matches[0] }
    if (matches.length === 0) return { kind: 'not_found', reference }
    return { kind: 'ambiguous', reference, matches }
}

export function expectFound<T extends Named>(kind: ReferenceKind, result: Lookup<T>): T {
    switch (result.kind) {
        case 'found':
            return result.value
        case 'not_found':
            throw new NotFoundError(kind, result.reference)
        case 'ambiguous':
            throw new AmbiguousReferenceError(
                kind,
                result.reference,
                result.matches.map((m) => m.id)
            )
    }
}
