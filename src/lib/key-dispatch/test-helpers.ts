/**
 * In-process stand-ins for the host toolkit, used by the key dispatch tests.
 */

import type { WidgetRef, WindowRef } from '$lib/commands/types'
import type { EventPhase } from '$lib/shortcuts/types'
import { createKeyEvent, type KeyEventInit } from './key-event'
import type {
    FocusContextProvider,
    HostEventPipeline,
    HostToolkit,
    KeyEvent,
    KeyEventDispatcher,
    KeyListener,
    LocalBinding,
} from './types'

export interface FakeWidgetOptions {
    textEditor?: boolean
    keyCapture?: boolean
    /** A table or tree around the widget is editing a cell */
    editingAncestor?: boolean
    enabled?: boolean
}

interface FakeWidgetState {
    removed: boolean
    overlayBusy: boolean
    textEditor: boolean
    keyCapture: boolean
    editingAncestor: boolean
    enabled: boolean
    listeners: KeyListener[]
    bindings: Map<string, LocalBinding>
}

export interface FakeHost {
    host: HostToolkit
    addWidget: (id: string, options?: FakeWidgetOptions) => WidgetRef
    /** Simulate the widget's window closing: it loses its root container */
    removeWidget: (widget: WidgetRef) => void
    setOverlayBusy: (widget: WidgetRef, busy: boolean) => void
    addListener: (widget: WidgetRef, listener: KeyListener) => void
    addBinding: (widget: WidgetRef, shortcut: string, binding?: Partial<LocalBinding>, phase?: EventPhase) => void
}

function bindingKey(shortcut: string, phase: EventPhase): string {
    return `${phase} ${shortcut}`
}

export function createFakeHost(): FakeHost {
    const widgets = new Map<string, FakeWidgetState>()

    function stateOf(widget: WidgetRef): FakeWidgetState {
        const state = widgets.get(widget.id)
        if (!state) {
            throw new Error(`Unknown widget '${widget.id}'`)
        }
        return state
    }

    const host: HostToolkit = {
        rootContainerOf(widget) {
            const state = widgets.get(widget.id)
            if (!state || state.removed) return null
            return { isOverlayBusy: () => state.overlayBusy }
        },
        isKeyCaptureField: (widget) => stateOf(widget).keyCapture,
        isTextEditor: (widget) => stateOf(widget).textEditor,
        ancestorIsEditing: (widget) => stateOf(widget).editingAncestor,
        isWidgetEnabled: (widget) => stateOf(widget).enabled,
        localListeners: (widget) => stateOf(widget).listeners,
        localBinding: (widget, keystroke) =>
            stateOf(widget).bindings.get(bindingKey(keystroke.shortcut, keystroke.phase)) ?? null,
    }

    return {
        host,

        addWidget(id, options = {}) {
            widgets.set(id, {
                removed: false,
                overlayBusy: false,
                textEditor: options.textEditor ?? false,
                keyCapture: options.keyCapture ?? false,
                editingAncestor: options.editingAncestor ?? false,
                enabled: options.enabled ?? true,
                listeners: [],
                bindings: new Map(),
            })
            return { id }
        },

        removeWidget(widget) {
            stateOf(widget).removed = true
        },

        setOverlayBusy(widget, busy) {
            stateOf(widget).overlayBusy = busy
        },

        addListener(widget, listener) {
            stateOf(widget).listeners.push(listener)
        },

        addBinding(widget, shortcut, binding = {}, phase = 'pressed') {
            stateOf(widget).bindings.set(bindingKey(shortcut, phase), {
                accept: binding.accept ?? (() => true),
                isEnabled: binding.isEnabled ?? (() => true),
            })
        },
    }
}

export interface FakeFocus extends FocusContextProvider {
    setFocusOwner: (widget: WidgetRef | null) => void
    setActiveWindow: (window: WindowRef | null) => void
}

export function createFakeFocus(focusOwner: WidgetRef | null, activeWindow: WindowRef | null): FakeFocus {
    let owner = focusOwner
    let active = activeWindow

    return {
        focusOwner: () => owner,
        activeWindow: () => active,
        setFocusOwner(widget) {
            owner = widget
        },
        setActiveWindow(window) {
            active = window
        },
    }
}

export interface FakePipeline extends HostEventPipeline {
    readonly dispatcherCount: number
    /** Events no dispatcher took, in the order the host processed them */
    readonly hostProcessed: KeyEvent[]
    /** Offer the event to each dispatcher in turn, then fall back to host processing */
    deliver: (event: KeyEvent) => boolean
}

export function createFakePipeline(): FakePipeline {
    const dispatchers: KeyEventDispatcher[] = []
    const hostProcessed: KeyEvent[] = []

    return {
        get dispatcherCount() {
            return dispatchers.length
        },
        hostProcessed,

        addKeyEventDispatcher(dispatcher) {
            dispatchers.push(dispatcher)
        },

        removeKeyEventDispatcher(dispatcher) {
            const index = dispatchers.indexOf(dispatcher)
            if (index >= 0) {
                dispatchers.splice(index, 1)
            }
        },

        deliver(event) {
            for (const dispatcher of dispatchers) {
                if (dispatcher.dispatch(event)) return true
            }
            hostProcessed.push(event)
            return false
        },
    }
}

export function pressed(init: Omit<KeyEventInit, 'phase'>): KeyEvent {
    return createKeyEvent({ ...init, phase: 'pressed' })
}

export function typed(init: Omit<KeyEventInit, 'phase'>): KeyEvent {
    return createKeyEvent({ ...init, phase: 'typed' })
}

export function released(init: Omit<KeyEventInit, 'phase'>): KeyEvent {
    return createKeyEvent({ ...init, phase: 'released' })
}
