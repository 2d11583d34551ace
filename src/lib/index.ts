/**
 * Public API.
 */

export * from './commands'
export * from './key-dispatch'
export * from './settings'
export * from './shortcuts'
export {
    addToast,
    dismissToast,
    dismissTransientToasts,
    clearAllToasts,
    getToasts,
    onToastsChange,
    type Toast,
    type ToastLevel,
    type ToastDismissal,
    type ToastOptions,
} from './ui/toast/toast-store'
export { initLogger, setVerboseLogging, getAppLogger, type Logger } from './logger'
export { startKeyArbiter, type StartKeyArbiterOptions } from './startup'
