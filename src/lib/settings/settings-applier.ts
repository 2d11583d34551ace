/**
 * Settings applier - applies settings changes to the running process.
 */

import { getSetting, onSettingChange } from './settings-store'
import { getAppLogger, setVerboseLogging } from '$lib/logger'

const log = getAppLogger('settings-applier')

let unsubscribe: (() => void) | undefined

function applyVerboseLogging(enabled: boolean): void {
    setVerboseLogging(enabled).catch((error: unknown) => {
        log.error('Failed to reconfigure logger: {error}', { error })
    })
}

/**
 * Apply current settings and keep applying them as they change. Calling it again is a no-op.
 */
export function initSettingsApplier(): void {
    if (unsubscribe) return

    applyVerboseLogging(getSetting('developer.verboseLogging'))

    unsubscribe = onSettingChange((id, value) => {
        log.debug('Setting changed: {id} = {value}', { id, value })
        if (id === 'developer.verboseLogging' && typeof value === 'boolean') {
            applyVerboseLogging(value)
        }
    })
}

export function cleanupSettingsApplier(): void {
    unsubscribe?.()
    unsubscribe = undefined
}
