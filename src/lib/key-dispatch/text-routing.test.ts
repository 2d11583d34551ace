import { describe, it, expect } from 'vitest'
import { createNativeFallbackProbe } from './native-fallback-probe'
import { createTextRoutingPolicy } from './text-routing'
import { createFakeHost, pressed, type FakeWidgetOptions } from './test-helpers'
import type { KeyEventInit } from './key-event'

function setup(options: FakeWidgetOptions = { textEditor: true }) {
    const fake = createFakeHost()
    const widget = fake.addWidget('widget', options)
    const policy = createTextRoutingPolicy(fake.host, createNativeFallbackProbe(fake.host))
    return { fake, widget, policy }
}

function route(policy: ReturnType<typeof setup>['policy'], widget: { id: string }, init: Omit<KeyEventInit, 'phase'>, shortcut: string) {
    return policy.mustRouteToText(pressed({ ...init, source: widget }), widget, { shortcut, phase: 'pressed' })
}

describe('mustRouteToText', () => {
    it('never routes for widgets that are not text editors', () => {
        const { policy, widget } = setup({})
        expect(route(policy, widget, { key: 'a' }, 'A')).toBe(false)
    })

    it('routes unmodified keys to the editor', () => {
        const { policy, widget } = setup()
        expect(route(policy, widget, { key: 'a' }, 'A')).toBe(true)
        expect(route(policy, widget, { key: 'ArrowLeft' }, '←')).toBe(true)
        expect(route(policy, widget, { key: 'A', shiftKey: true }, 'Shift+A')).toBe(true)
    })

    it('routes read-only editors the same way', () => {
        const { policy, widget } = setup({ textEditor: true, enabled: false })
        expect(route(policy, widget, { key: 'a' }, 'A')).toBe(true)
    })

    it('does not route Escape from a plain editor', () => {
        const { policy, widget } = setup()
        expect(route(policy, widget, { key: 'Escape' }, 'Esc')).toBe(false)
    })

    it('routes Escape from an editor inside a cell edit', () => {
        const { policy, widget } = setup({ textEditor: true, editingAncestor: true })
        expect(route(policy, widget, { key: 'Escape' }, 'Esc')).toBe(true)
        expect(route(policy, widget, { key: 'Escape', altKey: true }, 'Alt+Esc')).toBe(true)
    })

    it('routes modified keys only when the editor has its own binding', () => {
        const { fake, policy, widget } = setup()
        fake.addBinding(widget, 'Ctrl+C')

        expect(route(policy, widget, { key: 'c', ctrlKey: true }, 'Ctrl+C')).toBe(true)
        expect(route(policy, widget, { key: 's', ctrlKey: true }, 'Ctrl+S')).toBe(false)
    })

    it('treats Meta, Alt and AltGraph as modifiers', () => {
        const { policy, widget } = setup()
        expect(route(policy, widget, { key: 'b', metaKey: true }, 'Win+B')).toBe(false)
        expect(route(policy, widget, { key: 'b', altKey: true }, 'Alt+B')).toBe(false)
        expect(route(policy, widget, { key: 'b', altGraphKey: true }, 'AltGr+B')).toBe(false)
    })
})
