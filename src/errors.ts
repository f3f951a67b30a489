// Failure kinds surfaced by the icon build. All of them are fatal for the script.

export class MissingDependencyError extends Error {
  readonly dependency: string

  constructor(dependency: string, cause?: unknown) {
    super(`Required package "${dependency}" could not be loaded. Run \`npm install\` and try again.`, { cause })
    this.name = 'MissingDependencyError'
    this.dependency = dependency
  }
}

export type IoOperation = 'mkdir' | 'write' | 'stat'

export class IoFailureError extends Error {
  readonly path: string
  readonly operation: IoOperation

  constructor(operation: IoOperation, path: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`${operation} failed for ${path}: ${reason}`, { cause })
    this.name = 'IoFailureError'
    this.path = path
    this.operation = operation
  }
}

export class IcoFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'IcoFormatError'
  }
}
