/**
 * Toasts for the host to show. The dispatcher raises one when a disabled command's key is pressed.
 *
 * Transient toasts dismiss themselves once their timeout runs out. Persistent ones stay until dismissed.
 * At most five are kept: a new toast pushes out the oldest transient one, or is dropped when all five
 * are persistent.
 */

import { randomUUID } from 'crypto'

export type ToastLevel = 'info' | 'warn' | 'error'
export type ToastDismissal = 'transient' | 'persistent'

export interface ToastOptions {
    level?: ToastLevel
    dismissal?: ToastDismissal
    /** Default 4000. Ignored for persistent toasts. */
    timeoutMs?: number
    /** Dedup key. A toast with the same ID is replaced in place and its timeout starts over. */
    id?: string
}

export interface Toast {
    id: string
    content: string
    level: ToastLevel
    dismissal: ToastDismissal
    /** 0 for persistent toasts */
    timeoutMs: number
}

type ToastsListener = (toasts: readonly Toast[]) => void

const MAX_TOASTS = 5
const DEFAULT_TIMEOUT_MS = 4000

let toasts: Toast[] = []
const timers = new Map<string, ReturnType<typeof setTimeout>>()
const listeners = new Set<ToastsListener>()

function stopTimer(id: string): void {
    const timer = timers.get(id)
    if (timer !== undefined) {
        clearTimeout(timer)
        timers.delete(id)
    }
}

function startTimer(toast: Toast): void {
    stopTimer(toast.id)
    if (toast.dismissal === 'persistent') return

    const timer = setTimeout(() => {
        timers.delete(toast.id)
        dismissToast(toast.id)
    }, toast.timeoutMs)
    timers.set(toast.id, timer)
}

function publish(next: Toast[]): void {
    toasts = next
    for (const listener of listeners) {
        listener([...toasts])
    }
}

export function addToast(content: string, options: ToastOptions = {}): string {
    const dismissal = options.dismissal ?? 'transient'
    const toast: Toast = {
        id: options.id ?? randomUUID(),
        content,
        level: options.level ?? 'info',
        dismissal,
        timeoutMs: dismissal === 'persistent' ? 0 : (options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    }

    if (toasts.some((t) => t.id === toast.id)) {
        startTimer(toast)
        publish(toasts.map((t) => (t.id === toast.id ? toast : t)))
        return toast.id
    }

    let kept = toasts
    if (kept.length >= MAX_TOASTS) {
        const oldestTransient = kept.find((t) => t.dismissal === 'transient')
        if (!oldestTransient) {
            return toast.id
        }
        stopTimer(oldestTransient.id)
        kept = kept.filter((t) => t !== oldestTransient)
    }

    startTimer(toast)
    publish([...kept, toast])
    return toast.id
}

export function dismissToast(id: string): void {
    stopTimer(id)
    if (toasts.some((t) => t.id === id)) {
        publish(toasts.filter((t) => t.id !== id))
    }
}

export function dismissTransientToasts(): void {
    const transient = toasts.filter((t) => t.dismissal === 'transient')
    for (const toast of transient) {
        stopTimer(toast.id)
    }
    publish(toasts.filter((t) => t.dismissal === 'persistent'))
}

export function clearAllToasts(): void {
    for (const timer of timers.values()) {
        clearTimeout(timer)
    }
    timers.clear()
    publish([])
}

export function getToasts(): readonly Toast[] {
    return [...toasts]
}

/**
 * Subscribe to toast list changes. The host renders from the copy it receives.
 */
export function onToastsChange(listener: ToastsListener): () => void {
    listeners.add(listener)
    return () => listeners.delete(listener)
}
