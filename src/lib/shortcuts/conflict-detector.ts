/**
 * Conflict detection for keyboard shortcuts.
 * Lets hosts keep the "at most one command per keystroke in any active context" contract
 * the shortcut resolver relies on.
 */

import type { CommandRegistry } from '$lib/commands/command-registry'
import type { Command } from '$lib/commands/types'
import type { ShortcutConflict } from './types'
import type { ScopeHierarchy } from './scope-hierarchy'

/**
 * Find commands that conflict with a given shortcut in a given scope.
 * Two commands conflict if they share a shortcut and their scopes overlap.
 */
export function findConflictsForShortcut(
    registry: CommandRegistry,
    scopes: ScopeHierarchy,
    shortcut: string,
    scope: string,
    excludeCommandId?: string,
): Command[] {
    // Empty shortcuts can't conflict
    if (!shortcut) return []

    return registry.list().filter((cmd) => {
        if (cmd.id === excludeCommandId) return false

        const cmdShortcuts = registry.getEffectiveShortcuts(cmd.id).filter((s) => s)
        if (!cmdShortcuts.includes(shortcut)) return false

        return scopes.scopesOverlap(cmd.scope, scope)
    })
}

/**
 * Check if a command has any conflicts with other commands.
 */
export function hasConflicts(registry: CommandRegistry, scopes: ScopeHierarchy, commandId: string): boolean {
    const command = registry.get(commandId)
    if (!command) return false

    return registry
        .getEffectiveShortcuts(commandId)
        .some((shortcut) => findConflictsForShortcut(registry, scopes, shortcut, command.scope, commandId).length > 0)
}

/**
 * Get all conflicts in the registry.
 * Returns a list of shortcuts that are bound to multiple overlapping commands.
 */
export function getAllConflicts(registry: CommandRegistry, scopes: ScopeHierarchy): ShortcutConflict[] {
    const conflicts: ShortcutConflict[] = []
    const processed = new Set<string>()

    for (const cmd of registry.list()) {
        // Filter out empty shortcuts (used during editing)
        const shortcuts = registry.getEffectiveShortcuts(cmd.id).filter((s) => s)

        for (const shortcut of shortcuts) {
            if (processed.has(shortcut)) continue

            const sharing = findConflictsForShortcut(registry, scopes, shortcut, cmd.scope, cmd.id)
            if (sharing.length === 0) continue
            sharing.unshift(cmd)

            // Keep only commands that overlap with at least one other command sharing the shortcut
            const actualConflicts = sharing.filter((c) =>
                sharing.some((other) => other.id !== c.id && scopes.scopesOverlap(c.scope, other.scope)),
            )

            if (actualConflicts.length > 1) {
                conflicts.push({
                    shortcut,
                    commandIds: actualConflicts.map((c) => c.id),
                })
            }

            processed.add(shortcut)
        }
    }

    return conflicts
}

/**
 * Get all command IDs that have conflicts.
 */
export function getConflictingCommandIds(registry: CommandRegistry, scopes: ScopeHierarchy): Set<string> {
    const ids = new Set<string>()

    for (const conflict of getAllConflicts(registry, scopes)) {
        for (const id of conflict.commandIds) {
            ids.add(id)
        }
    }

    return ids
}
