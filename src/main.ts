#!/usr/bin/env node
import path from 'path'
import * as readline from 'node:readline/promises'
import { ArgumentError, parseArguments, USAGE } from './cli/arguments'
import { holeCountSchema, radiusSchema, resolveHoleOptions, seedSchema } from './cli/options'
import { listGcodeFiles, Log, Prompter } from './cli/prompts'
import { INPUT_FOLDER, OUTPUT_FOLDER, OUTPUT_PREFIX } from './constants'
import { HoleInjector } from './injector/holes'
import { GcodeReader } from './reader/base'
import { DEFAULT_HOLE_OPTIONS, HoleInjectionResult, HoleOptions } from './types/options'
import { GcodeWriter } from './writer/base'

export async function addSwissCheeseHoles(
  inputPath: string,
  outputPath: string,
  options: HoleOptions = DEFAULT_HOLE_OPTIONS
): Promise<HoleInjectionResult> {
  // Read G-code lines.
  const reader = new GcodeReader()
  const lines = await reader.readFile(inputPath)

  // Carve holes.
  const injector = new HoleInjector()
  const result = injector.inject(lines, options)

  // Write.
  const writer = new GcodeWriter()
  await writer.write(result.lines, outputPath)

  return result
}

export function outputPathFor(inputFile: string, outputFolder: string = OUTPUT_FOLDER): string {
  return path.join(outputFolder, `${OUTPUT_PREFIX}${path.basename(inputFile)}`)
}

function reportSuccess(outputPath: string, result: HoleInjectionResult, log: Log): void {
  log(`Angled-hole-modified G-code saved to: ${outputPath}`)
  log(`Moves removed: ${result.removed}`)
  log('Holes run diagonally through the entire model like classic Swiss cheese.')
}

export type Folders = {
  input: string
  output: string
}

// Returns the output path, or null when there was nothing to process.
export async function runInteractive(
  prompter: Prompter,
  folders: Folders = { input: INPUT_FOLDER, output: OUTPUT_FOLDER },
  log: Log = console.log
): Promise<string | null> {
  log('Angled Swiss Cheese G-code Modifier')
  log('Simulates full-depth diagonal holes through model at random XY angles.\n')

  const files = await listGcodeFiles(folders.input)
  if (files.length === 0) {
    log(
      `No G-code files found in the '${folders.input}' folder. Please add a .gcode file there and re-run.`
    )
    return null
  }

  const fileName = await prompter.choose('Choose a G-code file to modify:', files)

  const options: HoleOptions = {
    holeCount: await prompter.number(
      'Number of angled lines for holes',
      holeCountSchema,
      DEFAULT_HOLE_OPTIONS.holeCount
    ),
    radius: await prompter.number(
      'Hole radius (tolerance in mm)',
      radiusSchema,
      DEFAULT_HOLE_OPTIONS.radius
    ),
    seed: await prompter.number('Random seed', seedSchema, DEFAULT_HOLE_OPTIONS.seed)
  }

  const inputPath = path.join(folders.input, fileName)
  const outputPath = outputPathFor(fileName, folders.output)
  const result = await addSwissCheeseHoles(inputPath, outputPath, options)

  reportSuccess(outputPath, result, log)
  return outputPath
}

export async function runWithArguments(
  files: string[],
  options: HoleOptions,
  log: Log = console.log
): Promise<string> {
  const inputFile = files[0]
  // Default output file is the prefixed input name in the output folder.
  const outputFile = files.length > 1 ? files[1] : outputPathFor(inputFile)

  const result = await addSwissCheeseHoles(inputFile, outputFile, options)
  reportSuccess(outputFile, result, log)
  return outputFile
}

export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const cli = parseArguments(args)
    if (cli.help) {
      console.log(USAGE)
      return 0
    }

    if (cli.files.length > 0) {
      await runWithArguments(cli.files, resolveHoleOptions(cli.options))
      return 0
    }

    const rl = readline.createInterface({ input: process.stdin, output: process.stdout })
    try {
      await runInteractive(new Prompter((question) => rl.question(question)))
    } finally {
      rl.close()
    }
    return 0
  } catch (error) {
    if (error instanceof ArgumentError) {
      console.error(error.message)
      console.log(USAGE)
      return 2
    }
    console.error('Hole injection failed:', error instanceof Error ? error.message : error)
    return 1
  }
}

// Run the main function if this file is executed directly.
if (require.main === module) {
  main().then((code) => {
    process.exitCode = code
  })
}
