import { GcodeWord, Move, MoveParseResult } from '../types/gcode'
import { ParseError } from './exceptions'
import { isDecimal, parseDecimal } from './values'

const LINEAR_MOVE = 'G1'
const COMMENT_MARKER = ';'

const NO_MOVE: MoveParseResult = { kind: 'none' }

// Splits the code part of a line (everything before `;`) on whitespace.
export function tokenize(line: string): string[] {
  const commentStart = line.indexOf(COMMENT_MARKER)
  const code = commentStart === -1 ? line : line.slice(0, commentStart)
  return code.split(/\s+/).filter((token) => token.length > 0)
}

export class GcodeLineParser {
  // Returns the parameter words of a `G1` line, or null for any other line.
  // The command must start in column 0.
  private readWords(line: string): GcodeWord[] | null {
    if (!line.startsWith(LINEAR_MOVE)) {
      return null
    }

    const [command, ...parameters] = tokenize(line)
    if (command !== LINEAR_MOVE) {
      return null
    }

    return parameters.map((token) => ({ letter: token[0], text: token.slice(1) }))
  }

  public parseMove(line: string): MoveParseResult {
    const words = this.readWords(line)
    if (!words) {
      return NO_MOVE
    }

    // X must be immediately followed by Y. The last such pair wins.
    let pairIndex = -1
    for (let i = 0; i < words.length - 1; i++) {
      if (words[i].letter === 'X' && words[i + 1].letter === 'Y') {
        pairIndex = i
      }
    }
    if (pairIndex === -1) {
      return NO_MOVE
    }

    const zWords = words.slice(pairIndex + 2).filter((word) => word.letter === 'Z')
    const zWord = zWords.length > 0 ? zWords[zWords.length - 1] : undefined

    try {
      const move: Move = {
        x: parseDecimal(words[pairIndex].text, 'X'),
        y: parseDecimal(words[pairIndex + 1].text, 'Y')
      }
      if (zWord) {
        move.z = parseDecimal(zWord.text, 'Z')
      }
      return { kind: 'move', move }
    } catch (error) {
      if (error instanceof ParseError) {
        return NO_MOVE
      }
      throw error
    }
  }

  // A `G1` line that deposits material, i.e. carries a numeric E word.
  public isExtrusionMove(line: string): boolean {
    const words = this.readWords(line)
    if (!words) {
      return false
    }
    return words.some((word) => word.letter === 'E' && isDecimal(word.text))
  }
}
