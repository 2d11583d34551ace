/**
 * Types for keystrokes and shortcut configuration.
 */

/** Phase of a key event. A physical key produces pressed, optionally typed, then released. */
export type EventPhase = 'pressed' | 'typed' | 'released'

/** The key and modifier state of a key event */
export interface KeyInput {
    /** Key name as reported by the host (for example 'p', 'Escape', 'F1') */
    key: string
    metaKey: boolean
    ctrlKey: boolean
    altKey: boolean
    shiftKey: boolean
    altGraphKey?: boolean
}

/**
 * A keystroke as looked up in command and widget bindings.
 * `shortcut` uses the display format stored in command shortcuts (for example 'Ctrl+Shift+P').
 */
export interface Keystroke {
    shortcut: string
    phase: EventPhase
}

/** A conflict between commands sharing the same shortcut */
export interface ShortcutConflict {
    shortcut: string
    commandIds: string[]
}
