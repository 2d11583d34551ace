/**
 * Keyboard handler for shortcut matching: resolves a keystroke to the command bound to it
 * in the active window's scopes.
 */

import type { CommandRegistry } from '$lib/commands/command-registry'
import type { Command, WindowRef } from '$lib/commands/types'
import type { ActionResolver } from '$lib/key-dispatch/types'
import { getAppLogger } from '$lib/logger'
import { APP_SCOPE, createScopeHierarchy, type ScopeHierarchy } from './scope-hierarchy'
import type { Keystroke } from './types'

const log = getAppLogger('shortcuts')

export interface ShortcutActionResolverOptions {
    scopes?: ScopeHierarchy
    /** Scope for windows whose own scope (and owner's scope) is unknown. Default 'App'. */
    fallbackScope?: string
}

/**
 * Find all commands that match a given shortcut, regardless of scope.
 */
export function findCommandsWithShortcut(registry: CommandRegistry, shortcut: string): Command[] {
    return registry.list().filter((cmd) => registry.getEffectiveShortcuts(cmd.id).includes(shortcut))
}

/**
 * ActionResolver backed by a command registry.
 *
 * The window's scope decides which commands are reachable. A dialog whose scope is unknown
 * borrows the scope of the window that owns it; anything else gets the fallback scope.
 * Commands are bound on key press, so typed and released keystrokes never resolve.
 */
export function createShortcutActionResolver(
    registry: CommandRegistry,
    options: ShortcutActionResolverOptions = {},
): ActionResolver {
    const scopes = options.scopes ?? createScopeHierarchy()
    const fallbackScope = options.fallbackScope ?? APP_SCOPE

    function scopeForWindow(window: WindowRef): string {
        if (scopes.isKnownScope(window.scope)) return window.scope
        if (window.owner) return scopeForWindow(window.owner)
        return fallbackScope
    }

    return {
        actionForKeystroke(keystroke: Keystroke, activeWindow: WindowRef): Command | null {
            if (keystroke.phase !== 'pressed' || !keystroke.shortcut) {
                return null
            }

            // Check scopes in priority order (most specific first)
            for (const scope of scopes.getActiveScopes(scopeForWindow(activeWindow))) {
                const matches = registry
                    .list()
                    .filter((cmd) => cmd.scope === scope && registry.getEffectiveShortcuts(cmd.id).includes(keystroke.shortcut))

                if (matches.length > 1) {
                    log.warn('Shortcut {shortcut} is bound to {commandIds} in {scope}, using the first', {
                        shortcut: keystroke.shortcut,
                        commandIds: matches.map((c) => c.id).join(', '),
                        scope,
                    })
                }
                if (matches.length > 0) {
                    return matches[0]
                }
            }

            return null
        },
    }
}
