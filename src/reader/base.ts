import { promises as fs } from 'node:fs'

export class GcodeReadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'GcodeReadError'
  }
}

export class GcodeReader {
  // Splits text into lines, each keeping its `\n`. `\r\n` and lone `\r` are
  // read as `\n`. A final line without a newline is kept as-is; empty text
  // gives no lines.
  public readString(text: string): string[] {
    const content = text.replace(/\r\n?/g, '\n')
    const lines: string[] = []
    let start = 0

    while (start < content.length) {
      const end = content.indexOf('\n', start)
      if (end === -1) {
        lines.push(content.slice(start))
        break
      }
      lines.push(content.slice(start, end + 1))
      start = end + 1
    }

    return lines
  }

  public async readFile(filepath: string): Promise<string[]> {
    let content: string
    try {
      content = await fs.readFile(filepath, 'utf8')
    } catch (error) {
      throw new GcodeReadError(`Failed to read G-code file ${filepath}: ${error}`)
    }
    return this.readString(content)
  }
}
