/**
 * Definitions, defaults and validation of every setting.
 */

import type { SettingDefinition, SettingId, SettingsValues } from './types'
import { SettingValidationError } from './types'

const definitions: Record<SettingId, SettingDefinition> = {
    'keyboard.notEnabledFeedback': { type: 'boolean', default: true },
    'keyboard.notEnabledToastDuration': { type: 'duration', default: 3000, minMs: 500, maxMs: 30_000 },
    'developer.verboseLogging': { type: 'boolean', default: false },
}

export function isSettingId(id: string): id is SettingId {
    return Object.hasOwn(definitions, id)
}

export function getDefaultValue<K extends SettingId>(id: K): SettingsValues[K] {
    return definitions[id].default as SettingsValues[K]
}

/**
 * Throws SettingValidationError if the value doesn't fit the setting.
 */
export function validateSettingValue(id: SettingId, value: unknown): void {
    const def = definitions[id]

    if (def.type === 'boolean') {
        if (typeof value !== 'boolean') {
            throw new SettingValidationError(id, `Expected boolean, got ${typeof value}`)
        }
        return
    }

    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new SettingValidationError(id, 'Expected a duration in ms')
    }
    if (value < def.minMs || value > def.maxMs) {
        throw new SettingValidationError(
            id,
            `Duration must be between ${String(def.minMs)} and ${String(def.maxMs)} ms, got ${String(value)}`,
        )
    }
}
