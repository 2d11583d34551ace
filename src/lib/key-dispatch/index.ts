/**
 * Key dispatch module - decides which handler consumes each key event.
 */

export type {
    KeyEvent,
    FocusContextProvider,
    ActionResolver,
    KeyListener,
    LocalBinding,
    RootContainer,
    HostToolkit,
    MenuKeyProcessor,
    KeyEventDispatcher,
    HostEventPipeline,
} from './types'
export { createKeyEvent, type KeyEventInit } from './key-event'
export { UnknownPrecedenceError } from './errors'
export { resolveCommand, type ResolvedCommand } from './resolved-command'
export { createEventGate, type EventGate } from './event-gate'
export { createInProgressActionTracker, type ArmedState, type InProgressActionTracker } from './in-progress-tracker'
export { createNativeFallbackProbe, type NativeFallbackProbe } from './native-fallback-probe'
export { createTextRoutingPolicy, type TextRoutingPolicy } from './text-routing'
export { createKeyDispatcher, type KeyDispatcher, type KeyDispatcherOptions } from './key-dispatcher'
export { install, uninstall, getInstalledDispatcher, type InstallOptions } from './install'
