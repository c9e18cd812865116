import type { Command } from 'commander'
import chalk from 'chalk'
import { existsSync, readFileSync } from 'fs'
import { isStandardBitmap } from '../../decode/decode'
import { readCustomHeader, type CustomBitmapHeader } from '../../decode/header'
import { ByteInput } from '../../decode/streams'
import { fail, failOnDecodeError } from './fail'

export function registerInfoCommand(program: Command): void {
  program
    .command('info')
    .description('Show the header of a custom bitmap')
    .argument('<input>', 'Custom bitmap file')
    .action((input: string) => {
      if (!existsSync(input)) {
        fail(program, `Error: File '${input}' not found.`)
      }
      const data = new Uint8Array(readFileSync(input))
      if (isStandardBitmap(data)) {
        console.log(chalk.yellow('Standard BMP, nothing to decode.'))
        return
      }

      let header: CustomBitmapHeader
      try {
        header = readCustomHeader(new ByteInput(data))
      } catch (err) {
        failOnDecodeError(program, err)
      }

      const paletteEntries = header.palette === null ? 0 : header.palette.length / 4
      console.log(chalk.cyan('Bits per pixel:'), header.bitsPerPixel)
      console.log(chalk.cyan('Dimensions:'), `${header.width} x ${header.height}`)
      console.log(chalk.cyan('Palette entries:'), paletteEntries)
      console.log(chalk.cyan('Stride:'), header.stride)
      console.log(chalk.cyan('Image size:'), header.imageSize)
    })
}
