/**
 * Filters out key events no one may see.
 */

import { getAppLogger } from '$lib/logger'
import type { HostToolkit, KeyEvent } from './types'

const log = getAppLogger('keyDispatch')

export interface EventGate {
    /** True when the event must be swallowed without reaching any handler, host included */
    isBlocked: (event: KeyEvent) => boolean
}

export function createEventGate(host: Pick<HostToolkit, 'rootContainerOf'>): EventGate {
    return {
        isBlocked(event) {
            // Not a widget event, nothing to guard
            if (!event.source) return false

            const root = host.rootContainerOf(event.source)
            if (!root) {
                // The source was removed while handling an earlier event of this keystroke,
                // for example Escape closed its dialog on press. Drop the rest of the sequence.
                log.debug('Blocked {phase} {key}: {widgetId} has no root container', {
                    phase: event.phase,
                    key: event.key,
                    widgetId: event.source.id,
                })
                return true
            }

            if (root.isOverlayBusy()) {
                log.debug('Blocked {phase} {key}: overlay busy', { phase: event.phase, key: event.key })
                return true
            }

            return false
        },
    }
}
