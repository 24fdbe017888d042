/**
 * Error kinds raised or recorded by the view engine
 */

export type DuopaneErrorKind =
  | 'InvalidCursorState'
  | 'RenderBudgetExceeded'
  | 'UnknownUpdateEntity'
  | 'EmptyPaneNavigation'
  | 'SessionFailure'

export class DuopaneError extends Error {
  readonly kind: DuopaneErrorKind

  constructor(kind: DuopaneErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = kind
    this.kind = kind
  }
}

/**
 * Store invariant violation. Fatal: never expected in correct operation.
 */
export class InvalidCursorState extends DuopaneError {
  constructor(message: string) {
    super('InvalidCursorState', message)
  }
}

export class RenderBudgetExceeded extends DuopaneError {
  readonly messageId: string
  readonly budgetMs: number

  constructor(messageId: string, budgetMs: number) {
    super('RenderBudgetExceeded', `Image for message ${messageId} not ready within ${budgetMs}ms`)
    this.messageId = messageId
    this.budgetMs = budgetMs
  }
}

export class SessionFailure extends DuopaneError {
  constructor(message: string, cause?: unknown) {
    super('SessionFailure', message, { cause })
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error'
}
