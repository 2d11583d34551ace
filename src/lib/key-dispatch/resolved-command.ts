import type { ActionContext, Command, PrecedenceTier } from '$lib/commands/types'

/**
 * A command bound to the focus context of one dispatch.
 * Validity and enablement are evaluated at most once, on first use.
 */
export interface ResolvedCommand {
    readonly command: Command
    readonly context: ActionContext
    readonly precedence: PrecedenceTier
    isValid: () => boolean
    isEnabled: () => boolean
    execute: () => void
    reportNotEnabled: () => void
}

export function resolveCommand(command: Command, context: ActionContext): ResolvedCommand {
    let valid: boolean | undefined
    let enabled: boolean | undefined

    return {
        command,
        context,
        precedence: command.precedence,
        isValid() {
            if (valid === undefined) valid = command.isValid(context)
            return valid
        },
        isEnabled() {
            if (enabled === undefined) enabled = command.isEnabled(context)
            return enabled
        },
        execute() {
            command.execute(context)
        },
        reportNotEnabled() {
            command.reportNotEnabled?.(context)
        },
    }
}
