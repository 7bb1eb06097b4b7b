/**
 * Error handling module
 *
 * Every error thrown by the library derives from BaseError. Messages are
 * written as templates with positional `{n}` placeholders and filled in
 * from the constructor arguments.
 */

export function format(message: string, args: readonly unknown[]): string {
  return message.replace(/\{(\d+)\}/g, (_match, index: string) => {
    const value = args[Number(index)]
    return value === undefined || value === null ? '' : String(value)
  })
}

export interface ErrorOptions {
  cause?: unknown
}

export class BaseError extends Error {
  constructor(message?: string, options?: ErrorOptions) {
    super(message || 'Internal error', options)
    this.name = new.target.name
  }
}

/**
 * Raised by Preconditions when a caller hands the library something it
 * cannot work with (wrong type, out of range index, malformed hex).
 */
export class InvalidArgument extends BaseError {
  readonly argumentName: string

  constructor(argumentName: string, message?: string) {
    super(
      format('Invalid Argument: {0}{1}', [
        argumentName,
        message ? ' (' + message + ')' : '',
      ]),
    )
    this.argumentName = argumentName
  }
}

export class InvalidState extends BaseError {
  constructor(message: string) {
    super(format('Invalid state: {0}', [message]))
  }
}
