export class MissingInputFileError extends Error {
  readonly _tag = 'MissingInputFileError'
  constructor(
    public readonly path: string,
    public readonly label: string,
  ) {
    super(`Could not find required ${label} file: ${path}`)
    this.name = 'MissingInputFileError'
  }
}

export class InvalidInputError extends Error {
  readonly _tag = 'InvalidInputError'
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message)
    this.name = 'InvalidInputError'
  }
}

export class ConfigurationError extends Error {
  readonly _tag = 'ConfigurationError'
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export class ReportWriteError extends Error {
  readonly _tag = 'ReportWriteError'
  constructor(
    message: string,
    public readonly originalError?: unknown,
  ) {
    super(message)
    this.name = 'ReportWriteError'
  }
}

export type InputError = MissingInputFileError | InvalidInputError

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
