import { promises as fs } from 'node:fs'
import { GCODE_EXTENSION } from '../constants'
import { NumericOptionSchema, parseNumericOption } from './options'

export type Ask = (question: string) => Promise<string>
export type Log = (message: string) => void

// Lists `.gcode` files in `folder`, creating the folder if it does not exist.
export async function listGcodeFiles(folder: string): Promise<string[]> {
  await fs.mkdir(folder, { recursive: true })
  const entries = await fs.readdir(folder)
  return entries.filter((entry) => entry.toLowerCase().endsWith(GCODE_EXTENSION)).sort()
}

export class Prompter {
  private ask: Ask
  private log: Log

  constructor(ask: Ask, log: Log = console.log) {
    this.ask = ask
    this.log = log
  }

  // Asks until a valid 1-based option number is entered.
  public async choose(prompt: string, options: string[]): Promise<string> {
    this.log(`\n${prompt}`)
    options.forEach((option, i) => this.log(`${i + 1}. ${option}`))

    while (true) {
      const choice = (await this.ask('Enter choice number: ')).trim()
      const index = Number(choice)
      if (/^\d+$/.test(choice) && index >= 1 && index <= options.length) {
        return options[index - 1]
      }
      this.log('Invalid choice, try again.')
    }
  }

  public async number(
    prompt: string,
    schema: NumericOptionSchema,
    fallback: number
  ): Promise<number> {
    this.log(`${prompt} [Default: ${fallback}]`)
    const raw = await this.ask('Enter a value or press Enter to use default: ')

    const { value, notice } = parseNumericOption(raw, schema, fallback)
    if (notice) {
      this.log(notice)
    }
    return value
  }
}
