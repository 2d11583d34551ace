/**
 * Builds KeyEvent values from whatever the host reports.
 */

import type { WidgetRef } from '$lib/commands/types'
import type { EventPhase } from '$lib/shortcuts/types'
import type { KeyEvent } from './types'

export interface KeyEventInit {
    key: string
    phase: EventPhase
    source?: WidgetRef | null
    metaKey?: boolean
    ctrlKey?: boolean
    altKey?: boolean
    shiftKey?: boolean
    altGraphKey?: boolean
}

export function createKeyEvent(init: KeyEventInit): KeyEvent {
    let consumed = false

    return {
        key: init.key,
        phase: init.phase,
        source: init.source ?? null,
        metaKey: init.metaKey ?? false,
        ctrlKey: init.ctrlKey ?? false,
        altKey: init.altKey ?? false,
        shiftKey: init.shiftKey ?? false,
        altGraphKey: init.altGraphKey ?? false,
        get consumed() {
            return consumed
        },
        consume() {
            consumed = true
        },
    }
}
