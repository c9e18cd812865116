import type { Command } from 'commander'
import { registerConvertCommand } from './convert'
import { registerExtractCommand } from './extract'
import { registerInfoCommand } from './info'

export function registerCommands(program: Command): void {
  registerConvertCommand(program)
  registerExtractCommand(program)
  registerInfoCommand(program)
}
