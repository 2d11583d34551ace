/**
 * Key capture and formatting utilities.
 * Platform-specific - stores shortcuts as display strings.
 */

import type { EventPhase, KeyInput, Keystroke } from './types'

/** Check if the given platform is macOS */
export function isMacOS(platform: NodeJS.Platform = process.platform): boolean {
    return platform === 'darwin'
}

/** Special key name mappings */
const macKeyNames: Record<string, string> = {
    Backspace: '⌫',
    Delete: '⌦',
    Enter: '↩',
    Return: '↩',
    Escape: '⎋',
    Tab: 'Tab',
    ArrowUp: '↑',
    ArrowDown: '↓',
    ArrowLeft: '←',
    ArrowRight: '→',
    ' ': 'Space',
    PageUp: 'PgUp',
    PageDown: 'PgDn',
    Home: 'Home',
    End: 'End',
}

const nonMacKeyNames: Record<string, string> = {
    Backspace: 'Backspace',
    Delete: 'Delete',
    Enter: 'Enter',
    Return: 'Enter',
    Escape: 'Esc',
    Tab: 'Tab',
    ArrowUp: '↑',
    ArrowDown: '↓',
    ArrowLeft: '←',
    ArrowRight: '→',
    ' ': 'Space',
    PageUp: 'PgUp',
    PageDown: 'PgDn',
    Home: 'Home',
    End: 'End',
}

/**
 * Normalize a key name for display.
 * Single characters are uppercased, special keys are mapped.
 */
export function normalizeKeyName(key: string, platform: NodeJS.Platform = process.platform): string {
    // Single printable characters are uppercased
    if (key.length === 1 && key !== ' ') {
        return key.toUpperCase()
    }

    const keyMap = isMacOS(platform) ? macKeyNames : nonMacKeyNames
    return keyMap[key] ?? key
}

/**
 * Check if a key is a modifier (should not be captured alone).
 */
export function isModifierKey(key: string): boolean {
    return ['Meta', 'Control', 'Alt', 'AltGraph', 'Shift', 'OS'].includes(key)
}

/**
 * Whether the input carries a modifier that text editing does not consume.
 * Shift alone does not count: it only changes which character is typed.
 */
export function isModified(input: KeyInput): boolean {
    return input.altKey || input.altGraphKey === true || input.metaKey || input.ctrlKey
}

/**
 * Format a key input into a display string.
 * macOS: ⌘⇧P
 * Windows/Linux: Ctrl+Shift+P
 */
export function formatKeyCombo(input: KeyInput, platform: NodeJS.Platform = process.platform): string {
    const parts: string[] = []
    const mac = isMacOS(platform)

    if (mac) {
        if (input.metaKey) parts.push('⌘')
        if (input.ctrlKey) parts.push('⌃')
        if (input.altKey) parts.push('⌥')
        if (input.shiftKey) parts.push('⇧')
    } else {
        if (input.ctrlKey) parts.push('Ctrl')
        if (input.altKey) parts.push('Alt')
        if (input.altGraphKey) parts.push('AltGr')
        if (input.shiftKey) parts.push('Shift')
        if (input.metaKey) parts.push('Win')
    }

    // Don't include modifier keys themselves as the main key
    if (!isModifierKey(input.key)) {
        parts.push(normalizeKeyName(input.key, platform))
    }

    return mac ? parts.join('') : parts.join('+')
}

/**
 * The keystroke for a key event, in the format command and widget bindings are keyed by.
 */
export function keystrokeForEvent(
    input: KeyInput & { phase: EventPhase },
    platform: NodeJS.Platform = process.platform,
): Keystroke {
    return { shortcut: formatKeyCombo(input, platform), phase: input.phase }
}
