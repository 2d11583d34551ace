/**
 * Vitest test setup file.
 * Resets the module-level state (installed dispatcher, settings, toasts) after every test.
 */

import { afterEach } from 'vitest'
import { uninstall } from '$lib/key-dispatch/install'
import { resetSettingsForTests } from '$lib/settings/settings-store'
import { clearAllToasts } from '$lib/ui/toast/toast-store'

afterEach(() => {
    uninstall()
    resetSettingsForTests()
    clearAllToasts()
})
