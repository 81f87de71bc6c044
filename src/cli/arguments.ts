import { RawHoleOptions } from './options'

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ArgumentError'
  }
}

export type CliArguments = {
  files: string[]
  options: RawHoleOptions
  help: boolean
}

const VALUE_FLAGS: Record<string, keyof RawHoleOptions> = {
  '--holes': 'holes',
  '--radius': 'radius',
  '--seed': 'seed'
}

export const USAGE = [
  'Usage: gcode-swiss-cheese [inputFile] [outputFile] [--holes N] [--radius MM] [--seed S]',
  'Without an input file, choose a file from the input folder interactively.',
  'Example: gcode-swiss-cheese ./part.gcode --holes 30 --radius 1.5 --seed 7'
].join('\n')

export function parseArguments(args: string[]): CliArguments {
  const parsed: CliArguments = { files: [], options: {}, help: false }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]

    if (arg === '--help' || arg === '-h') {
      parsed.help = true
      continue
    }

    if (!arg.startsWith('--')) {
      parsed.files.push(arg)
      continue
    }

    // Accept both `--flag value` and `--flag=value`.
    const equals = arg.indexOf('=')
    const flag = equals === -1 ? arg : arg.slice(0, equals)
    const inlineValue = equals === -1 ? undefined : arg.slice(equals + 1)
    const key = VALUE_FLAGS[flag]
    if (!key) {
      throw new ArgumentError(`Unknown option: ${flag}`)
    }

    const value = inlineValue ?? args[++i]
    if (value === undefined) {
      throw new ArgumentError(`Missing value for ${flag}`)
    }
    parsed.options[key] = value
  }

  if (parsed.files.length > 2) {
    throw new ArgumentError(`Too many file arguments: ${parsed.files.join(' ')}`)
  }

  return parsed
}
