#!/usr/bin/env node
import { Command } from 'commander'
import { registerCommands } from './commands'

const program = new Command()

program
  .name('cbmp')
  .description('Convert compressed custom bitmaps to standard BMP and unpack JAM archives')
  .version('0.1.0')

registerCommands(program)

program.parse()
