/**
 * LogTape setup. Every feature logs under ['app', feature], e.g. ['app', 'keyDispatch']:
 *
 *   const log = getAppLogger('keyDispatch')
 *   log.debug('Armed {commandId}', { commandId })
 *
 * Records are dropped until initLogger() runs. After that the 'app' category logs info and up
 * (error and up when NODE_ENV is production), or everything from debug up in verbose mode.
 *
 * @module logger
 */

import { configure, getConsoleSink, getLogger, type LogLevel, type Logger } from '@logtape/logtape'

export type { Logger } from '@logtape/logtape'

const normalLevel: LogLevel = process.env.NODE_ENV === 'production' ? 'error' : 'info'

let verbose = false
let configured = false

async function configureConsole(reset: boolean): Promise<void> {
    await configure({
        sinks: { console: getConsoleSink() },
        loggers: [
            { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['console'] },
            { category: 'app', lowestLevel: verbose ? 'debug' : normalLevel, sinks: ['console'] },
        ],
        reset,
    })
}

/**
 * Start writing app records to the console. Later calls do nothing.
 */
export async function initLogger(options: { verbose?: boolean } = {}): Promise<void> {
    if (configured) return

    verbose = options.verbose ?? verbose
    await configureConsole(false)
    configured = true

    if (verbose) {
        getAppLogger('logger').info('Logger initialized in verbose mode')
    }
}

/**
 * Switch verbose mode at runtime. Before initLogger() it only changes what initLogger() will use.
 */
export async function setVerboseLogging(enabled: boolean): Promise<void> {
    const changed = enabled !== verbose
    verbose = enabled
    if (!changed || !configured) return

    await configureConsole(true)
    getAppLogger('logger').info('Verbose logging {state}', { state: enabled ? 'on' : 'off' })
}

export function getAppLogger(feature: string): Logger {
    return getLogger(['app', feature])
}
