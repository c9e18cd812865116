import type { Command } from 'commander'
import chalk from 'chalk'
import { createHash } from 'crypto'
import { existsSync, readFileSync, writeFileSync } from 'fs'
import { join, parse } from 'path'
import { convertToBmp, type ConvertResult } from '../../convert'
import type { ChunkToken } from '../../decode/chunk'
import { fail, failOnDecodeError, failOnWriteError } from './fail'

// 64 MiB of pixels
export const DEFAULT_MAX_IMAGE_SIZE = 64 * 1024 * 1024

export function defaultOutputPath(input: string): string {
  const { dir, name } = parse(input)
  return join(dir, `${name}_dumped.bmp`)
}

export function formatToken(token: ChunkToken): string {
  switch (token.type) {
    case 'literal':
      return `literal @${token.position} 0x${token.value.toString(16).padStart(2, '0')}`
    case 'copy':
      return `copy    @${token.position} offset=${token.offset} length=${token.length}`
    case 'end':
      return `end     @${token.position}`
  }
}

export function registerConvertCommand(program: Command): void {
  program
    .command('convert')
    .description('Convert a custom bitmap to a standard uncompressed BMP')
    .argument('<input>', 'Custom bitmap file')
    .option('-o, --output <path>', 'Output BMP path (default: <input>_dumped.bmp)')
    .option('--trace', 'Print every decoded token')
    .option('--max-image-size <bytes>', 'Largest pixel array to decode', String(DEFAULT_MAX_IMAGE_SIZE))
    .action((input: string, opts: { output?: string; trace?: boolean; maxImageSize: string }) => {
      if (!existsSync(input)) {
        fail(program, `Error: File '${input}' not found.`)
      }
      const maxImageSize = Number(opts.maxImageSize)
      if (!Number.isInteger(maxImageSize) || maxImageSize < 0) {
        fail(program, `Invalid --max-image-size: ${opts.maxImageSize}`)
      }
      const output = opts.output ?? defaultOutputPath(input)
      const data = new Uint8Array(readFileSync(input))

      let result: ConvertResult
      try {
        result = convertToBmp(data, {
          maxImageSize,
          onToken: opts.trace ? (token) => console.log(chalk.gray(formatToken(token))) : undefined,
        })
      } catch (err) {
        failOnDecodeError(program, err)
      }

      try {
        writeFileSync(output, result.bmp)
      } catch (err) {
        failOnWriteError(program, err)
      }
      if (result.passthrough) {
        console.log(chalk.yellow(`Standard BMP detected. Copied to ${output}`))
      } else {
        console.log(chalk.green(`Saved to ${output}`))
      }
      console.log(chalk.gray(createHash('md5').update(result.bmp).digest('hex')))
    })
}
