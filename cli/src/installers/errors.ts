import type { CommandResult, StepOutcome } from './types.js'

export class InstallError extends Error {
  readonly exitCode: number

  constructor(message: string, exitCode = 1) {
    super(message)
    this.name = 'InstallError'
    this.exitCode = exitCode
  }
}

/** Wrap a failed command result into a fatal step outcome. */
export function fatalFrom(result: Extract<CommandResult, { ok: false }>): StepOutcome {
  // Spawn errors carry no exit status; report them as a generic failure.
  const exitCode = result.exitCode && result.exitCode > 0 ? result.exitCode : 1
  return { status: 'fatal', error: new InstallError(result.diagnostic, exitCode) }
}

export function fatal(message: string): StepOutcome {
  return { status: 'fatal', error: new InstallError(message) }
}
