import type { Command } from 'commander'
import chalk from 'chalk'
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import { dirname, join, resolve } from 'path'
import { readJamArchive, type JamArchive } from '../../archive/jam'
import { fail, failOnDecodeError, failOnWriteError } from './fail'

// Writes folders and files under `destination`; returns the number of files
export function writeJamArchive(archive: JamArchive, destination: string): number {
  mkdirSync(destination, { recursive: true })
  for (const folder of archive.folders) {
    mkdirSync(join(destination, folder), { recursive: true })
  }
  for (const file of archive.files) {
    const target = join(destination, file.path)
    mkdirSync(dirname(target), { recursive: true })
    writeFileSync(target, file.data)
  }
  return archive.files.length
}

export function registerExtractCommand(program: Command): void {
  program
    .command('extract')
    .description('Extract a JAM archive')
    .argument('<archive>', 'JAM archive file')
    .requiredOption('-o, --output <dir>', 'Destination directory')
    .action((archivePath: string, opts: { output: string }) => {
      if (!existsSync(archivePath)) {
        fail(program, `Error: File '${archivePath}' not found.`)
      }

      let archive: JamArchive
      try {
        archive = readJamArchive(new Uint8Array(readFileSync(archivePath)))
      } catch (err) {
        failOnDecodeError(program, err)
      }

      let count: number
      try {
        count = writeJamArchive(archive, opts.output)
      } catch (err) {
        failOnWriteError(program, err)
      }
      console.log(
        chalk.green(`Extracted ${count} file${count !== 1 ? 's' : ''} from ${archivePath} to ${resolve(opts.output)}.`)
      )
    })
}
