import type { Command } from 'commander'
import chalk from 'chalk'
import { isBitmapDecodeError } from '../../decode/errors'

// Prints in red and exits with status 1 (throws under exitOverride)
export function fail(program: Command, message: string): never {
  return program.error(chalk.red(message), { exitCode: 1 })
}

// Format errors become a message, anything else is a bug and propagates
export function failOnDecodeError(program: Command, err: unknown): never {
  if (isBitmapDecodeError(err)) {
    fail(program, `Error processing file: ${err.message}`)
  }
  throw err
}

// Output files that cannot be written are reported like format errors
export function failOnWriteError(program: Command, err: unknown): never {
  const message = err instanceof Error ? err.message : String(err)
  return fail(program, `Error processing file: ${message}`)
}
