/**
 * Decides when a key event belongs to a focused text editor, ahead of any command.
 */

import type { WidgetRef } from '$lib/commands/types'
import { isModified } from '$lib/shortcuts/key-capture'
import type { Keystroke } from '$lib/shortcuts/types'
import type { NativeFallbackProbe } from './native-fallback-probe'
import type { HostToolkit, KeyEvent } from './types'

export interface TextRoutingPolicy {
    mustRouteToText: (event: KeyEvent, destination: WidgetRef, keystroke: Keystroke) => boolean
}

export function createTextRoutingPolicy(
    host: Pick<HostToolkit, 'isTextEditor' | 'ancestorIsEditing'>,
    probe: Pick<NativeFallbackProbe, 'hasRegisteredBinding'>,
): TextRoutingPolicy {
    return {
        mustRouteToText(event, destination, keystroke) {
            // Editability is not checked: read-only editors still need copy and navigation keys
            if (!host.isTextEditor(destination)) return false

            // Escape goes to cell editors; otherwise it stays available for closing windows
            if (event.key === 'Escape') {
                return host.ancestorIsEditing(destination)
            }

            if (!isModified(event)) return true

            return probe.hasRegisteredBinding(destination, keystroke)
        },
    }
}
