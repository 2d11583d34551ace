import { describe, it, expect } from 'vitest'
import { getDefaultValue, isSettingId, validateSettingValue } from './settings-registry'
import { SettingValidationError } from './types'

describe('getDefaultValue', () => {
    it('returns the defaults', () => {
        expect(getDefaultValue('keyboard.notEnabledFeedback')).toBe(true)
        expect(getDefaultValue('keyboard.notEnabledToastDuration')).toBe(3000)
        expect(getDefaultValue('developer.verboseLogging')).toBe(false)
    })
})

describe('isSettingId', () => {
    it('accepts registered IDs only', () => {
        expect(isSettingId('developer.verboseLogging')).toBe(true)
        expect(isSettingId('developer.somethingElse')).toBe(false)
        expect(isSettingId('toString')).toBe(false)
    })
})

describe('validateSettingValue', () => {
    it('accepts defaults', () => {
        expect(() => validateSettingValue('keyboard.notEnabledFeedback', true)).not.toThrow()
        expect(() => validateSettingValue('keyboard.notEnabledToastDuration', 3000)).not.toThrow()
    })

    it('rejects the wrong type for booleans', () => {
        expect(() => validateSettingValue('keyboard.notEnabledFeedback', 'yes')).toThrow(
            "Invalid value for setting 'keyboard.notEnabledFeedback': Expected boolean, got string",
        )
    })

    it('accepts durations at both ends of the range', () => {
        expect(() => validateSettingValue('keyboard.notEnabledToastDuration', 500)).not.toThrow()
        expect(() => validateSettingValue('keyboard.notEnabledToastDuration', 30000)).not.toThrow()
    })

    it('rejects durations out of range', () => {
        expect(() => validateSettingValue('keyboard.notEnabledToastDuration', 100)).toThrow(
            'Duration must be between 500 and 30000 ms, got 100',
        )
        expect(() => validateSettingValue('keyboard.notEnabledToastDuration', 60000)).toThrow(SettingValidationError)
    })

    it('rejects durations that are not finite numbers', () => {
        expect(() => validateSettingValue('keyboard.notEnabledToastDuration', Number.NaN)).toThrow(
            "Invalid value for setting 'keyboard.notEnabledToastDuration': Expected a duration in ms",
        )
        expect(() => validateSettingValue('keyboard.notEnabledToastDuration', '3000')).toThrow(SettingValidationError)
    })
})
