/**
 * Preconditions utility module
 */

import { InvalidArgument, InvalidState } from '../errors.js'

export class Preconditions {
  static checkState(condition: boolean, message: string): asserts condition {
    if (!condition) {
      throw new InvalidState(message)
    }
  }

  static checkArgument(
    condition: boolean,
    argumentName: string,
    message?: string,
  ): asserts condition {
    if (!condition) {
      throw new InvalidArgument(argumentName, message)
    }
  }

  static checkArgumentType(
    argument: unknown,
    type: 'string' | 'number' | 'bytes',
    argumentName?: string,
  ): void {
    argumentName = argumentName || '(unknown name)'
    const matches =
      type === 'bytes'
        ? argument instanceof Uint8Array
        : typeof argument === type
    if (!matches) {
      throw new InvalidArgument(
        argumentName,
        'expected ' + type + ' but got ' + describeType(argument),
      )
    }
  }
}

function describeType(argument: unknown): string {
  if (argument === null) return 'null'
  if (Array.isArray(argument)) return 'array'
  return typeof argument
}
