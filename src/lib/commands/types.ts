/**
 * Command types for keyboard dispatch and shortcut configuration.
 */

/** A widget in the host toolkit. Hosts extend it with their own fields. */
export interface WidgetRef {
    readonly id: string
}

/** A top-level window in the host toolkit */
export interface WindowRef {
    readonly id: string
    /** Shortcut scope of the window (for example 'Main window') */
    readonly scope: string
    /** Owning window, set for dialogs */
    readonly owner?: WindowRef
}

/** Focus state a command is resolved against */
export interface ActionContext {
    focusOwner: WidgetRef | null
    activeWindow: WindowRef | null
}

/**
 * Key binding precedence tiers, highest first:
 * - system: reserved commands, win over everything except key capture
 * - localListener: commands that win only after the focused widget's key listeners declined the event
 * - localBinding: commands that win only after the focused widget's own bindings declined the event
 * - toolDefault: ordinary tool-level commands
 *
 * The dispatcher checks the same gates before arming localListener, localBinding and toolDefault
 * commands; the tier only records where the command was registered to sit.
 */
export const PRECEDENCE_TIERS = ['system', 'localListener', 'localBinding', 'toolDefault'] as const

export type PrecedenceTier = (typeof PRECEDENCE_TIERS)[number]

/** A command definition */
export interface Command {
    /** Unique identifier (e.g., 'app.help', 'edit.copy') */
    id: string
    /** Display name, also used in "not available" feedback */
    name: string
    /** Scope the command belongs to (see scope-hierarchy) */
    scope: string
    /** Precedence tier, fixed at registration */
    precedence: PrecedenceTier
    /** Default keyboard shortcuts (e.g., ['Ctrl+Shift+P', 'F1']) */
    shortcuts: string[]
    /** Optional description for long-form help */
    description?: string
    /** Whether the command applies to the focus context at all */
    isValid: (context: ActionContext) => boolean
    /** Whether the command may run right now */
    isEnabled: (context: ActionContext) => boolean
    execute: (context: ActionContext) => void
    /** User feedback for a valid command that is not enabled */
    reportNotEnabled?: (context: ActionContext) => void
}

/** What callers provide to register a command. Missing fields get defaults from defineCommand(). */
export type CommandDefinition = Pick<Command, 'id' | 'name' | 'execute'> &
    Partial<Omit<Command, 'id' | 'name' | 'execute'>>
