import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { addToast, dismissToast, dismissTransientToasts, clearAllToasts, getToasts, onToastsChange } from './toast-store'

beforeEach(() => {
    vi.useFakeTimers()
})

afterEach(() => {
    clearAllToasts()
    vi.useRealTimers()
})

describe('addToast', () => {
    it('adds a transient info toast by default', () => {
        const id = addToast('Not available')

        expect(getToasts()).toEqual([
            { id, content: 'Not available', level: 'info', dismissal: 'transient', timeoutMs: 4000 },
        ])
    })

    it('gives persistent toasts no timeout', () => {
        addToast('Stays', { id: 'p', dismissal: 'persistent', timeoutMs: 9000 })
        expect(getToasts()[0].timeoutMs).toBe(0)
    })

    it('replaces a toast with the same ID in place', () => {
        addToast('first', { id: 'dup', level: 'info' })
        addToast('other', { id: 'other' })
        addToast('second', { id: 'dup', level: 'error' })

        expect(getToasts().map((t) => [t.id, t.content, t.level])).toEqual([
            ['dup', 'second', 'error'],
            ['other', 'other', 'info'],
        ])
    })
})

describe('expiry', () => {
    it('dismisses a transient toast when its timeout runs out', () => {
        addToast('Save is not available right now', { id: 'save', timeoutMs: 3000 })

        vi.advanceTimersByTime(2999)
        expect(getToasts()).toHaveLength(1)

        vi.advanceTimersByTime(1)
        expect(getToasts()).toEqual([])
    })

    it('starts the timeout over when a toast is replaced', () => {
        addToast('a', { id: 'dup', timeoutMs: 1000 })
        vi.advanceTimersByTime(800)
        addToast('a', { id: 'dup', timeoutMs: 1000 })

        vi.advanceTimersByTime(800)
        expect(getToasts().map((t) => t.id)).toEqual(['dup'])

        vi.advanceTimersByTime(200)
        expect(getToasts()).toEqual([])
    })

    it('never dismisses persistent toasts on its own', () => {
        addToast('Stays', { id: 'p', dismissal: 'persistent' })
        vi.advanceTimersByTime(60_000)
        expect(getToasts().map((t) => t.id)).toEqual(['p'])
    })

    it('cancels pending timers when toasts are dismissed', () => {
        addToast('a', { id: 'a' })
        addToast('b', { id: 'b' })
        dismissToast('a')
        clearAllToasts()

        expect(vi.getTimerCount()).toBe(0)
    })
})

describe('dismissToast', () => {
    it('removes the toast with that ID only', () => {
        addToast('a', { id: 'a' })
        addToast('b', { id: 'b' })
        dismissToast('a')
        dismissToast('nonexistent')

        expect(getToasts().map((t) => t.id)).toEqual(['b'])
    })
})

describe('dismissTransientToasts', () => {
    it('keeps persistent toasts', () => {
        addToast('a', { id: 'a' })
        addToast('b', { id: 'b', dismissal: 'persistent' })
        addToast('c', { id: 'c' })

        dismissTransientToasts()

        expect(getToasts().map((t) => t.id)).toEqual(['b'])
        expect(vi.getTimerCount()).toBe(0)
    })
})

describe('five toasts at most', () => {
    it('pushes out the oldest transient toast', () => {
        addToast('p', { id: 'p', dismissal: 'persistent' })
        for (const id of ['t1', 't2', 't3', 't4']) {
            addToast(id, { id })
        }

        addToast('t5', { id: 't5' })

        expect(getToasts().map((t) => t.id)).toEqual(['p', 't2', 't3', 't4', 't5'])
        expect(vi.getTimerCount()).toBe(4)
    })

    it('drops the new toast when all five are persistent', () => {
        for (const id of ['p1', 'p2', 'p3', 'p4', 'p5']) {
            addToast(id, { id, dismissal: 'persistent' })
        }

        addToast('new', { id: 'new' })

        expect(getToasts().map((t) => t.id)).toEqual(['p1', 'p2', 'p3', 'p4', 'p5'])
        expect(vi.getTimerCount()).toBe(0)
    })
})

describe('getToasts', () => {
    it('returns a copy that later changes do not touch', () => {
        addToast('a', { id: 'a' })
        const before = getToasts()

        addToast('b', { id: 'b' })

        expect(before).not.toBe(getToasts())
        expect(before.map((t) => t.id)).toEqual(['a'])
    })
})

describe('onToastsChange', () => {
    it('sends the list on every change until unsubscribed', () => {
        const listener = vi.fn()
        const unsubscribe = onToastsChange(listener)

        addToast('a', { id: 'a' })
        vi.advanceTimersByTime(4000)
        unsubscribe()
        addToast('b', { id: 'b' })

        expect(listener.mock.calls).toEqual([[[expect.objectContaining({ id: 'a' })]], [[]]])
    })
})
