/**
 * In-memory settings with synchronous reads and change listeners.
 */

import { getAppLogger } from '$lib/logger'
import { getDefaultValue, isSettingId, validateSettingValue } from './settings-registry'
import type { SettingId, SettingsValues } from './types'
import { SettingValidationError } from './types'

const log = getAppLogger('settings')

type SettingChangeListener = (id: SettingId, value: SettingsValues[SettingId]) => void

const values = new Map<SettingId, SettingsValues[SettingId]>()
const listeners = new Set<SettingChangeListener>()

/**
 * Replace all values with the given ones; the rest fall back to defaults. Listeners are not notified.
 * Throws SettingValidationError, leaving the current values untouched, if any value is invalid.
 */
export function initializeSettings(initial: Partial<SettingsValues> = {}): void {
    const entries: Array<[SettingId, SettingsValues[SettingId]]> = []
    for (const [id, value] of Object.entries(initial)) {
        if (value === undefined) continue
        if (!isSettingId(id)) {
            throw new SettingValidationError(id, 'Unknown setting')
        }
        validateSettingValue(id, value)
        entries.push([id, value])
    }

    values.clear()
    for (const [id, value] of entries) {
        values.set(id, value)
    }
    log.info('Settings initialized, {count} set, the rest default', { count: entries.length })
}

export function getSetting<K extends SettingId>(id: K): SettingsValues[K] {
    const value = values.get(id)
    if (value !== undefined) {
        return value as SettingsValues[K]
    }
    return getDefaultValue(id)
}

/**
 * Throws SettingValidationError if the value is invalid.
 */
export function setSetting<K extends SettingId>(id: K, value: SettingsValues[K]): void {
    log.debug('setSetting({id}, {value})', { id, value })

    validateSettingValue(id, value)
    values.set(id, value)
    notifyListeners(id, value)
}

export function resetSetting(id: SettingId): void {
    setSetting(id, getDefaultValue(id))
}

/**
 * Subscribe to all setting changes.
 */
export function onSettingChange(listener: SettingChangeListener): () => void {
    listeners.add(listener)
    return () => listeners.delete(listener)
}

function notifyListeners(id: SettingId, value: SettingsValues[SettingId]): void {
    for (const listener of listeners) {
        try {
            listener(id, value)
        } catch (error) {
            log.error('Setting change listener error: {error}', { error })
        }
    }
}

/**
 * Drop values and listeners. Used between tests.
 */
export function resetSettingsForTests(): void {
    values.clear()
    listeners.clear()
}

export { SettingValidationError }
