export type PipelineErrorCode = 'COMMAND_FAILED' | 'ARTIFACT_MISSING' | 'UNKNOWN_STEP' | 'UNSAFE_CLEAN'

/**
 * Base error for everything the build pipeline raises itself.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode
  readonly details?: Record<string, unknown>

  constructor(message: string, code: PipelineErrorCode, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options)
    this.name = 'PipelineError'
    this.code = code
    this.details = details
  }
}

/**
 * A subprocess exited non-zero, was killed by a signal, or could not be spawned
 * (exitCode is null and the spawn error is the cause).
 */
export class CommandFailedError extends PipelineError {
  readonly command: string
  readonly args: string[]
  readonly exitCode: number | null
  readonly signal: NodeJS.Signals | null

  constructor(
    command: string,
    args: string[],
    exitCode: number | null,
    signal: NodeJS.Signals | null = null,
    output?: string,
    options?: ErrorOptions
  ) {
    const line = [command, ...args].join(' ')
    const reason = exitCode !== null
      ? `exited with code ${exitCode}`
      : signal
        ? `was terminated by ${signal}`
        : 'could not be started'
    super(`Command "${line}" ${reason}`, 'COMMAND_FAILED', { command, args, exitCode, signal, output }, options)
    this.name = 'CommandFailedError'
    this.command = command
    this.args = args
    this.exitCode = exitCode
    this.signal = signal
  }
}

export class ArtifactMissingError extends PipelineError {
  readonly path: string

  constructor(path: string) {
    super(`Expected executable not found at ${path}`, 'ARTIFACT_MISSING', { path })
    this.name = 'ArtifactMissingError'
    this.path = path
  }
}

// A directory scheduled for removal is the project itself or holds build inputs
export class UnsafeCleanError extends PipelineError {
  readonly path: string

  constructor(path: string, protectedPath: string) {
    super(`Refusing to remove ${path}: it contains ${protectedPath}`, 'UNSAFE_CLEAN', { path, protectedPath })
    this.name = 'UnsafeCleanError'
    this.path = path
  }
}

export class UnknownStepError extends PipelineError {
  readonly stepIds: string[]

  constructor(stepIds: string[], known: string[]) {
    super(`Unknown step(s): ${stepIds.join(', ')} (available: ${known.join(', ')})`, 'UNKNOWN_STEP', { stepIds, known })
    this.name = 'UnknownStepError'
    this.stepIds = stepIds
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
