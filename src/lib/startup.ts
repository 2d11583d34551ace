/**
 * Host startup: settings, logging, then the key dispatcher.
 */

import type { CommandRegistry } from '$lib/commands/command-registry'
import { install, type KeyDispatcher } from '$lib/key-dispatch'
import type { FocusContextProvider, HostEventPipeline, HostToolkit, MenuKeyProcessor } from '$lib/key-dispatch'
import { initLogger } from '$lib/logger'
import { getSetting, initializeSettings, initSettingsApplier, type SettingsValues } from '$lib/settings'
import { createShortcutActionResolver, createScopeHierarchy, type ScopeHierarchyDefinition } from '$lib/shortcuts'

export interface StartKeyArbiterOptions {
    pipeline: HostEventPipeline
    host: HostToolkit
    focusProvider: FocusContextProvider
    registry: CommandRegistry
    scopes?: ScopeHierarchyDefinition
    menuKeyProcessor?: MenuKeyProcessor
    /** Values for settings that should not start at their defaults */
    settings?: Partial<SettingsValues>
}

export async function startKeyArbiter(options: StartKeyArbiterOptions): Promise<KeyDispatcher> {
    initializeSettings(options.settings)
    await initLogger({ verbose: getSetting('developer.verboseLogging') })
    initSettingsApplier()

    const actionResolver = createShortcutActionResolver(options.registry, {
        scopes: createScopeHierarchy(options.scopes),
    })

    return install({
        pipeline: options.pipeline,
        host: options.host,
        focusProvider: options.focusProvider,
        actionResolver,
        menuKeyProcessor: options.menuKeyProcessor,
    })
}
