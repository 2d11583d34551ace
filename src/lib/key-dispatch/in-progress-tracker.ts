/**
 * Two-phase lifecycle of the command that won a keystroke: armed on press, executed on release.
 *
 * Some platforms stop delivering a keystroke's follow-on events once a command runs on press,
 * so commands run on release. While a command is armed every event is absorbed until the
 * matching release, including events for other keys.
 */

import type { WidgetRef } from '$lib/commands/types'
import { getAppLogger } from '$lib/logger'
import type { ResolvedCommand } from './resolved-command'
import type { KeyEvent } from './types'

const log = getAppLogger('keyDispatch')

export type ArmedState =
    | { type: 'idle' }
    | {
          type: 'armed'
          command: ResolvedCommand
          /** Widget the arming event was headed for; the release must go to the same one */
          target: WidgetRef | null
      }

const IDLE: ArmedState = { type: 'idle' }

export interface InProgressActionTracker {
    readonly state: ArmedState
    /**
     * True when the event is absorbed by the armed command. Pressed and typed events are absorbed
     * wherever they are headed. A release to the armed target runs the command; a release headed
     * anywhere else forfeits it and returns false so the release is dispatched normally.
     */
    isContinuation: (event: KeyEvent, destination: WidgetRef | null) => boolean
    /** Arm a command. Returns false and keeps the current one if a command is already armed. */
    arm: (command: ResolvedCommand, target: WidgetRef | null) => boolean
    /** Drop any armed command without running it */
    reset: () => void
}

export function createInProgressActionTracker(): InProgressActionTracker {
    let state: ArmedState = IDLE

    return {
        get state() {
            return state
        },

        isContinuation(event, destination) {
            if (state.type === 'idle') return false

            const { command, target } = state

            if (event.phase !== 'released') {
                return true
            }

            // Focus moved between press and release
            if (destination !== target) {
                state = IDLE
                log.debug('Forfeited {commandId}: {phase} {key} went to {widgetId}', {
                    commandId: command.command.id,
                    phase: event.phase,
                    key: event.key,
                    widgetId: destination?.id ?? 'nothing',
                })
                return false
            }

            // Clear before running so a throwing command can't leave us armed
            state = IDLE
            log.debug('Executing {commandId} on release of {key}', { commandId: command.command.id, key: event.key })
            try {
                command.execute()
            } catch (error) {
                log.error('Command {commandId} failed: {error}', { commandId: command.command.id, error })
                throw error
            }
            return true
        },

        arm(command, target) {
            if (state.type === 'armed') {
                log.warn('Not arming {commandId}: {armedId} is still armed', {
                    commandId: command.command.id,
                    armedId: state.command.command.id,
                })
                return false
            }

            state = { type: 'armed', command, target }
            log.debug('Armed {commandId}', { commandId: command.command.id })
            return true
        },

        reset() {
            state = IDLE
        },
    }
}
