import type { PrecedenceTier } from '$lib/commands/types'

/**
 * A command declared a precedence tier the dispatcher has no step for.
 * Someone added a tier without teaching the dispatcher about it.
 */
export class UnknownPrecedenceError extends Error {
    constructor(
        public commandId: string,
        public precedence: PrecedenceTier,
    ) {
        super(`Command '${commandId}' has precedence '${precedence}', which no dispatch step handles. New precedence tier added?`)
        this.name = 'UnknownPrecedenceError'
    }
}
