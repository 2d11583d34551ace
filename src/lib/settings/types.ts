/**
 * Settings the dispatcher reads.
 */

export interface SettingsValues {
    /** Show a toast when the key of a command that can't run right now is pressed */
    'keyboard.notEnabledFeedback': boolean
    /** How long that toast stays up, in ms */
    'keyboard.notEnabledToastDuration': number
    /** Log every dispatch decision at debug level */
    'developer.verboseLogging': boolean
}

export type SettingId = keyof SettingsValues

export type SettingDefinition =
    | { type: 'boolean'; default: boolean }
    | { type: 'duration'; default: number; minMs: number; maxMs: number }

export class SettingValidationError extends Error {
    constructor(
        public settingId: string,
        public reason: string,
    ) {
        super(`Invalid value for setting '${settingId}': ${reason}`)
        this.name = 'SettingValidationError'
    }
}
