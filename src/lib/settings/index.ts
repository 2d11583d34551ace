/**
 * Settings module - definitions, in-memory values and live application of settings.
 */

export * from './types'
export { getDefaultValue, validateSettingValue } from './settings-registry'
export { initializeSettings, getSetting, setSetting, resetSetting, onSettingChange } from './settings-store'
export { initSettingsApplier, cleanupSettingsApplier } from './settings-applier'
