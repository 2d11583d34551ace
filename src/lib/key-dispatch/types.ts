/**
 * Types for key event dispatch: the event model and the host collaborators the dispatcher consumes.
 */

import type { ActionContext, Command, WidgetRef, WindowRef } from '$lib/commands/types'
import type { EventPhase, KeyInput, Keystroke } from '$lib/shortcuts/types'

/** A key event as delivered by the host toolkit */
export interface KeyEvent extends KeyInput {
    readonly phase: EventPhase
    /** Widget the event was delivered to. Null for events the host synthesized outside the widget tree. */
    readonly source: WidgetRef | null
    /** Set once any handler consumed the event */
    readonly consumed: boolean
    consume: () => void
}

/** Answers what has focus right now */
export interface FocusContextProvider {
    focusOwner: () => WidgetRef | null
    activeWindow: () => WindowRef | null
}

/** Finds the command bound to a keystroke in the active window's context */
export interface ActionResolver {
    actionForKeystroke: (keystroke: Keystroke, activeWindow: WindowRef) => Command | null
}

/** A key listener registered directly on a widget. It may consume the event it is given. */
export interface KeyListener {
    keyPressed?: (event: KeyEvent) => void
    keyTyped?: (event: KeyEvent) => void
    keyReleased?: (event: KeyEvent) => void
}

/** A key binding registered directly on a widget by the host toolkit */
export interface LocalBinding {
    /** Fine-grained applicability for the given widget, may be stricter than isEnabled() */
    accept: (widget: WidgetRef) => boolean
    isEnabled: () => boolean
}

/** Root container of a widget: the window-level layer that can block input with a busy overlay */
export interface RootContainer {
    isOverlayBusy: () => boolean
}

/**
 * Queries the dispatcher needs from the host toolkit. The dispatcher never inspects widget types
 * itself; every capability is a question put to the host.
 */
export interface HostToolkit {
    /** Null once the widget has been removed or hidden (for example, its dialog closed) */
    rootContainerOf: (widget: WidgetRef) => RootContainer | null
    /** The field used to record a new key assignment */
    isKeyCaptureField: (widget: WidgetRef) => boolean
    isTextEditor: (widget: WidgetRef) => boolean
    /** Whether a table or tree containing the widget is editing a cell */
    ancestorIsEditing: (widget: WidgetRef) => boolean
    isWidgetEnabled: (widget: WidgetRef) => boolean
    localListeners: (widget: WidgetRef) => readonly KeyListener[]
    /** The widget's binding for the keystroke, when focused or when an ancestor of the focused widget */
    localBinding: (widget: WidgetRef, keystroke: Keystroke) => LocalBinding | null
}

/** Optional menu navigation short-circuit */
export interface MenuKeyProcessor {
    /** True when the event drove an open menu and must not go anywhere else */
    processMenuKeyEvent: (event: KeyEvent) => boolean
}

/** Something that takes key events before the host's own processing */
export interface KeyEventDispatcher {
    /** True when the event was fully handled and the host must not process it */
    dispatch: (event: KeyEvent) => boolean
}

/** The host's event pipeline the dispatcher installs itself into */
export interface HostEventPipeline {
    addKeyEventDispatcher: (dispatcher: KeyEventDispatcher) => void
    removeKeyEventDispatcher: (dispatcher: KeyEventDispatcher) => void
}

export type { ActionContext, Command, WidgetRef, WindowRef }
