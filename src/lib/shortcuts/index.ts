/**
 * Keyboard shortcuts module.
 * Re-exports all public APIs for keystroke formatting, scopes, resolution and conflicts.
 */

// Types
export type { EventPhase, KeyInput, Keystroke, ShortcutConflict } from './types'

// Scope hierarchy
export {
    createScopeHierarchy,
    defaultScopeHierarchy,
    APP_SCOPE,
    type ScopeHierarchy,
    type ScopeHierarchyDefinition,
} from './scope-hierarchy'

// Key capture
export {
    formatKeyCombo,
    keystrokeForEvent,
    normalizeKeyName,
    isModifierKey,
    isModified,
    isMacOS,
} from './key-capture'

// Conflict detection
export { findConflictsForShortcut, hasConflicts, getAllConflicts, getConflictingCommandIds } from './conflict-detector'

// Keyboard handler
export {
    createShortcutActionResolver,
    findCommandsWithShortcut,
    type ShortcutActionResolverOptions,
} from './keyboard-handler'
