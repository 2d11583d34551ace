/**
 * Registry of the commands a host exposes to keyboard dispatch.
 *
 * This is the single source of truth for:
 * - Which command a keystroke resolves to (through the shortcut resolver)
 * - Shortcut conflict detection
 * - Shortcut customization while the host runs (overrides live in memory only)
 */

import type { ActionContext, Command, CommandDefinition } from './types'
import { getSetting } from '$lib/settings/settings-store'
import { addToast } from '$lib/ui/toast/toast-store'
import { getAppLogger } from '$lib/logger'

const log = getAppLogger('commands')

export class CommandRegistryError extends Error {
    constructor(
        public commandId: string,
        public reason: string,
    ) {
        super(`Command '${commandId}': ${reason}`)
        this.name = 'CommandRegistryError'
    }
}

/**
 * Default feedback for a valid command that can't run right now: a transient warning toast.
 * Respects the keyboard.notEnabledFeedback setting.
 */
export function createNotEnabledToastReporter(name: string, commandId: string): (context: ActionContext) => void {
    return () => {
        if (!getSetting('keyboard.notEnabledFeedback')) return
        addToast(`${name} is not available right now`, {
            id: `not-enabled:${commandId}`,
            level: 'warn',
            timeoutMs: getSetting('keyboard.notEnabledToastDuration'),
        })
    }
}

/**
 * Fill in defaults: tool-level precedence, always valid, always enabled, toast feedback.
 */
export function defineCommand(definition: CommandDefinition): Command {
    return {
        scope: 'App',
        precedence: 'toolDefault',
        shortcuts: [],
        isValid: () => true,
        isEnabled: () => true,
        reportNotEnabled: createNotEnabledToastReporter(definition.name, definition.id),
        ...definition,
    }
}

type ShortcutChangeListener = (commandId: string) => void

export interface CommandRegistry {
    /** Register a command. Throws CommandRegistryError if the ID is taken. */
    register: (definition: CommandDefinition) => Command
    unregister: (commandId: string) => boolean
    get: (commandId: string) => Command | undefined
    /** All commands, in registration order */
    list: () => Command[]
    /** Custom shortcuts if set, otherwise defaults. Always a copy. */
    getEffectiveShortcuts: (commandId: string) => string[]
    getDefaultShortcuts: (commandId: string) => string[]
    isShortcutModified: (commandId: string) => boolean
    setShortcut: (commandId: string, index: number, shortcut: string) => void
    addShortcut: (commandId: string, shortcut: string) => void
    removeShortcut: (commandId: string, index: number) => void
    resetShortcut: (commandId: string) => void
    resetAllShortcuts: () => void
    onShortcutChange: (listener: ShortcutChangeListener) => () => void
}

export function createCommandRegistry(definitions: CommandDefinition[] = []): CommandRegistry {
    const commands = new Map<string, Command>()
    const customShortcuts = new Map<string, string[]>()
    const listeners = new Set<ShortcutChangeListener>()

    function requireCommand(commandId: string): Command {
        const command = commands.get(commandId)
        if (!command) {
            throw new CommandRegistryError(commandId, 'not registered')
        }
        return command
    }

    function getDefaultShortcuts(commandId: string): string[] {
        return [...(commands.get(commandId)?.shortcuts ?? [])]
    }

    function getEffectiveShortcuts(commandId: string): string[] {
        const custom = customShortcuts.get(commandId)
        if (custom) {
            return [...custom]
        }
        return getDefaultShortcuts(commandId)
    }

    /** Drop the override when it ends up equal to the defaults. */
    function cleanupIfMatchesDefaults(commandId: string): void {
        const current = customShortcuts.get(commandId)
        if (!current) return

        const defaults = getDefaultShortcuts(commandId)
        const matches = current.length === defaults.length && current.every((shortcut, i) => shortcut === defaults[i])

        if (matches) {
            customShortcuts.delete(commandId)
        }
    }

    function notifyListeners(commandId: string): void {
        for (const listener of listeners) {
            try {
                listener(commandId)
            } catch (error) {
                log.error('Shortcut change listener error: {error}', { error })
            }
        }
    }

    function storeShortcuts(commandId: string, shortcuts: string[]): void {
        customShortcuts.set(commandId, shortcuts)
        cleanupIfMatchesDefaults(commandId)
        notifyListeners(commandId)
    }

    const registry: CommandRegistry = {
        register(definition) {
            if (commands.has(definition.id)) {
                throw new CommandRegistryError(definition.id, 'already registered')
            }
            const command = defineCommand(definition)
            commands.set(command.id, command)
            log.debug('Registered {commandId} ({precedence}) in {scope}', {
                commandId: command.id,
                precedence: command.precedence,
                scope: command.scope,
            })
            return command
        },

        unregister(commandId) {
            customShortcuts.delete(commandId)
            return commands.delete(commandId)
        },

        get(commandId) {
            return commands.get(commandId)
        },

        list() {
            return [...commands.values()]
        },

        getEffectiveShortcuts,
        getDefaultShortcuts,

        isShortcutModified(commandId) {
            return customShortcuts.has(commandId)
        },

        setShortcut(commandId, index, shortcut) {
            requireCommand(commandId)
            log.debug('setShortcut({commandId}, {index}, {shortcut})', { commandId, index, shortcut })
            const current = getEffectiveShortcuts(commandId)

            if (index >= 0 && index < current.length) {
                current[index] = shortcut
            } else if (index === current.length) {
                current.push(shortcut)
            } else {
                throw new CommandRegistryError(commandId, `shortcut index ${String(index)} is out of range`)
            }

            storeShortcuts(commandId, current)
        },

        addShortcut(commandId, shortcut) {
            requireCommand(commandId)
            storeShortcuts(commandId, [...getEffectiveShortcuts(commandId), shortcut])
        },

        removeShortcut(commandId, index) {
            requireCommand(commandId)
            const current = getEffectiveShortcuts(commandId)

            if (index < 0 || index >= current.length) {
                throw new CommandRegistryError(commandId, `shortcut index ${String(index)} is out of range`)
            }

            current.splice(index, 1)
            storeShortcuts(commandId, current)
        },

        resetShortcut(commandId) {
            requireCommand(commandId)
            if (customShortcuts.delete(commandId)) {
                notifyListeners(commandId)
            }
        },

        resetAllShortcuts() {
            const modifiedIds = [...customShortcuts.keys()]
            customShortcuts.clear()
            for (const id of modifiedIds) {
                notifyListeners(id)
            }
        },

        onShortcutChange(listener) {
            listeners.add(listener)
            return () => listeners.delete(listener)
        },
    }

    for (const definition of definitions) {
        registry.register(definition)
    }

    return registry
}
