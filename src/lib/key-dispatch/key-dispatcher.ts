/**
 * Key event dispatcher that gives registered commands a place in the host's key processing.
 *
 * A toolkit's usual order is: key listeners on the focused widget, then the widget's own bindings,
 * then its ancestors' bindings. The dispatcher changes that to:
 *
 * 1. Commands of the system tier
 * 2. Key listeners on the focused widget
 * 3. Bindings of the focused widget
 * 4. Commands of the localListener, localBinding and toolDefault tiers, checked in that order
 * 5. The host's normal processing (ancestor bindings and so on)
 *
 * Widgets keep first say over their keys, commands get theirs before the host walks up the
 * widget tree. Text editors and key capture fields are handled as exceptions (see below).
 */

import type { PrecedenceTier, WidgetRef } from '$lib/commands/types'
import { getAppLogger } from '$lib/logger'
import { isModifierKey, keystrokeForEvent } from '$lib/shortcuts/key-capture'
import { UnknownPrecedenceError } from './errors'
import { createEventGate } from './event-gate'
import { createInProgressActionTracker, type ArmedState } from './in-progress-tracker'
import { createNativeFallbackProbe } from './native-fallback-probe'
import { resolveCommand, type ResolvedCommand } from './resolved-command'
import { createTextRoutingPolicy } from './text-routing'
import type {
    ActionResolver,
    FocusContextProvider,
    HostToolkit,
    KeyEvent,
    KeyEventDispatcher,
    MenuKeyProcessor,
} from './types'

const log = getAppLogger('keyDispatch')

/** Tiers arbitrated after listeners and bindings, in order. System has its own fast path. */
const ARBITRATED_TIERS: readonly PrecedenceTier[] = ['localListener', 'localBinding', 'toolDefault']

export interface KeyDispatcherOptions {
    host: HostToolkit
    actionResolver: ActionResolver
    focusProvider: FocusContextProvider
    menuKeyProcessor?: MenuKeyProcessor
    /** Platform used to format keystrokes. Defaults to the running platform. */
    platform?: NodeJS.Platform
}

export interface KeyDispatcher extends KeyEventDispatcher {
    /** Swap the focus source, for tests and host integration */
    setFocusOwnerProvider: (provider: FocusContextProvider) => void
    getArmedState: () => ArmedState
    /** Drop any armed command without running it */
    reset: () => void
}

export function createKeyDispatcher(options: KeyDispatcherOptions): KeyDispatcher {
    const { host, actionResolver, menuKeyProcessor } = options
    const platform = options.platform ?? process.platform
    let focusProvider = options.focusProvider

    const gate = createEventGate(host)
    const tracker = createInProgressActionTracker()
    const probe = createNativeFallbackProbe(host)
    const textRouting = createTextRoutingPolicy(host, probe)

    function destinationOf(event: KeyEvent): WidgetRef | null {
        return event.source ?? focusProvider.focusOwner()
    }

    function processSystemPrecedence(command: ResolvedCommand, event: KeyEvent, destination: WidgetRef | null): boolean {
        // The user is recording a key assignment; let them pick keys system commands would claim
        if (destination && host.isKeyCaptureField(destination)) {
            return false
        }

        if (command.precedence !== 'system') {
            return false
        }

        // Validity and enablement are deliberately not checked for system commands
        tracker.arm(command, destination)
        event.consume()
        return true
    }

    function processAtPrecedence(
        tier: PrecedenceTier,
        command: ResolvedCommand,
        event: KeyEvent,
        destination: WidgetRef | null,
    ): boolean {
        if (command.precedence !== tier) {
            return false
        }

        tracker.arm(command, destination)
        event.consume()
        return true
    }

    function dispatch(event: KeyEvent): boolean {
        if (gate.isBlocked(event)) {
            return true
        }

        const destination = destinationOf(event)

        // Always let an armed command finish its keystroke
        if (tracker.isContinuation(event, destination)) {
            return true
        }

        // Menu navigation keys drive the open menu and nothing else
        if (menuKeyProcessor?.processMenuKeyEvent(event)) {
            return true
        }

        const activeWindow = focusProvider.activeWindow()
        if (!activeWindow || isModifierKey(event.key)) {
            return false
        }

        const keystroke = keystrokeForEvent(event, platform)
        const command = actionResolver.actionForKeystroke(keystroke, activeWindow)
        if (!command) {
            return false
        }

        const focusOwner = focusProvider.focusOwner()
        const resolved = resolveCommand(command, { focusOwner, activeWindow })

        if (processSystemPrecedence(resolved, event, destination)) {
            log.debug('{shortcut} armed system command {commandId}', { shortcut: keystroke.shortcut, commandId: command.id })
            return true
        }
        if (resolved.precedence === 'system') {
            // Key capture field: the keystroke is being recorded, not run
            return false
        }

        if (destination && textRouting.mustRouteToText(event, destination, keystroke)) {
            log.debug('{shortcut} left to text editor {widgetId}', { shortcut: keystroke.shortcut, widgetId: destination.id })
            return false
        }

        // Listeners and bindings on the focused widget come before commands
        if (focusOwner && probe.processLocalListeners(focusOwner, event)) {
            log.debug('{shortcut} consumed by a key listener on {widgetId}', {
                shortcut: keystroke.shortcut,
                widgetId: focusOwner.id,
            })
            return true
        }

        // The host runs the binding itself; we only step aside
        if (focusOwner && probe.hasLocalBinding(focusOwner, keystroke)) {
            log.debug('{shortcut} left to a binding on {widgetId}', { shortcut: keystroke.shortcut, widgetId: focusOwner.id })
            return false
        }

        if (!resolved.isValid()) {
            // No usable context: let the host have the key, so Escape can still close a dialog
            return false
        }

        if (!resolved.isEnabled()) {
            // Nothing on the focused widget wants this key and the command can't run.
            // Stop here rather than let the host do something unrelated with it.
            log.debug('{commandId} is not enabled', { commandId: command.id })
            resolved.reportNotEnabled()
            return true
        }

        for (const tier of ARBITRATED_TIERS) {
            if (processAtPrecedence(tier, resolved, event, destination)) {
                log.debug('{shortcut} armed {commandId} at {tier}', { shortcut: keystroke.shortcut, commandId: command.id, tier })
                return true
            }
        }

        const error = new UnknownPrecedenceError(command.id, command.precedence)
        log.fatal('{message}', { message: error.message })
        throw error
    }

    return {
        dispatch,

        setFocusOwnerProvider(provider) {
            focusProvider = provider
        },

        getArmedState() {
            return tracker.state
        },

        reset() {
            tracker.reset()
        },
    }
}
