/**
 * Installation of the key dispatcher into the host's event pipeline.
 * This is the only place holding the dispatcher globally; everything else gets it passed in.
 */

import { getAppLogger } from '$lib/logger'
import { createKeyDispatcher, type KeyDispatcher, type KeyDispatcherOptions } from './key-dispatcher'
import type { HostEventPipeline } from './types'

const log = getAppLogger('keyDispatch')

export interface InstallOptions extends KeyDispatcherOptions {
    pipeline: HostEventPipeline
}

let installed: { dispatcher: KeyDispatcher; pipeline: HostEventPipeline } | null = null

/**
 * Create the dispatcher and register it with the host. Calling it again has no effect and
 * returns the dispatcher installed first.
 */
export function install(options: InstallOptions): KeyDispatcher {
    if (installed) {
        log.debug('Key dispatcher already installed, skipping')
        return installed.dispatcher
    }

    const dispatcher = createKeyDispatcher(options)
    options.pipeline.addKeyEventDispatcher(dispatcher)
    installed = { dispatcher, pipeline: options.pipeline }
    log.info('Key dispatcher installed')
    return dispatcher
}

/**
 * Remove the installed dispatcher from the host and drop any armed command. Used by tests and teardown.
 */
export function uninstall(): void {
    if (!installed) return

    installed.pipeline.removeKeyEventDispatcher(installed.dispatcher)
    installed.dispatcher.reset()
    installed = null
    log.info('Key dispatcher uninstalled')
}

export function getInstalledDispatcher(): KeyDispatcher | null {
    return installed?.dispatcher ?? null
}
