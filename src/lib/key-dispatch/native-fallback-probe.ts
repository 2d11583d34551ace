/**
 * Asks the host whether its ordinary per-widget handling would take a key event.
 */

import type { WidgetRef } from '$lib/commands/types'
import type { Keystroke } from '$lib/shortcuts/types'
import type { HostToolkit, KeyEvent, KeyListener } from './types'

export interface NativeFallbackProbe {
    /**
     * Run the widget's key listeners for the event's phase.
     * True if any of them consumed the event.
     */
    processLocalListeners: (widget: WidgetRef, event: KeyEvent) => boolean
    /** Whether the widget registered a binding for the keystroke, usable or not */
    hasRegisteredBinding: (widget: WidgetRef, keystroke: Keystroke) => boolean
    /** Whether the widget has a binding for the keystroke that would run right now */
    hasLocalBinding: (widget: WidgetRef, keystroke: Keystroke) => boolean
}

function invokeListener(listener: KeyListener, event: KeyEvent): void {
    switch (event.phase) {
        case 'pressed':
            listener.keyPressed?.(event)
            break
        case 'typed':
            listener.keyTyped?.(event)
            break
        case 'released':
            listener.keyReleased?.(event)
            break
    }
}

export function createNativeFallbackProbe(
    host: Pick<HostToolkit, 'localListeners' | 'localBinding' | 'isWidgetEnabled'>,
): NativeFallbackProbe {
    return {
        processLocalListeners(widget, event) {
            for (const listener of host.localListeners(widget)) {
                invokeListener(listener, event)
            }
            return event.consumed
        },

        hasRegisteredBinding(widget, keystroke) {
            return host.localBinding(widget, keystroke) !== null
        },

        hasLocalBinding(widget, keystroke) {
            if (!host.isWidgetEnabled(widget)) return false

            const binding = host.localBinding(widget, keystroke)
            if (!binding) return false

            // accept() can be stricter than isEnabled(), e.g. a tree's cancel binding is only
            // acceptable while an edit is active, so check it first
            if (!binding.accept(widget)) return false

            return binding.isEnabled()
        },
    }
}
