/**
 * Scope hierarchy for keyboard shortcuts.
 * Determines which scopes' shortcuts are active in a given context.
 */

/**
 * Scope hierarchy - when a scope is active, these scopes' shortcuts also trigger.
 * Order matters: more specific scopes are listed first for priority.
 */
export type ScopeHierarchyDefinition = Record<string, readonly string[]>

export interface ScopeHierarchy {
    /**
     * All scopes that are active when the given scope is current, most specific first.
     * Empty for unknown scopes.
     */
    getActiveScopes: (current: string) => readonly string[]
    /** Whether two scopes can see each other's shortcuts (so their shortcuts can conflict) */
    scopesOverlap: (scopeA: string, scopeB: string) => boolean
    isKnownScope: (scope: string) => boolean
}

/** Scope every window falls back to. */
export const APP_SCOPE = 'App'

/** Hierarchy used when the host does not provide one */
export const defaultScopeHierarchy: ScopeHierarchyDefinition = {
    App: ['App'],
    'Main window': ['Main window', 'App'],
    Dialog: ['Dialog', 'App'],
}

export function createScopeHierarchy(definition: ScopeHierarchyDefinition = defaultScopeHierarchy): ScopeHierarchy {
    const hierarchy = new Map<string, readonly string[]>(Object.entries(definition))

    function getActiveScopes(current: string): readonly string[] {
        return hierarchy.get(current) ?? []
    }

    return {
        getActiveScopes,

        scopesOverlap(scopeA, scopeB) {
            const activeA = getActiveScopes(scopeA)
            const activeB = getActiveScopes(scopeB)
            // If either scope is unknown (empty activeScopes), treat them as non-overlapping
            if (activeA.length === 0 || activeB.length === 0) {
                return false
            }
            return activeA.includes(scopeB) || activeB.includes(scopeA)
        },

        isKnownScope(scope) {
            return hierarchy.has(scope)
        },
    }
}
