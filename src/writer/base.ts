import { promises as fs } from 'node:fs'
import path from 'path'

export class GcodeWriteError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'GcodeWriteError'
  }
}

export class GcodeWriter {
  public format(lines: readonly string[]): string {
    return lines.join('')
  }

  // Writes `lines` verbatim, creating the output folder if needed.
  public async write(lines: readonly string[], outputPath: string): Promise<string> {
    const gcode = this.format(lines)
    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true })
      await fs.writeFile(outputPath, gcode, 'utf8')
    } catch (error) {
      throw new GcodeWriteError(
        `Failed to write G-code file ${outputPath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      )
    }
    return gcode
  }
}
