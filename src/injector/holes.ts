import { REMOVED_COMMENT_PREFIX, SUMMARY_COMMENT_PREFIX } from '../constants'
import { GcodeLineParser } from '../parsers/move'
import { Point } from '../types/base'
import { CuttingLine } from '../types/gcode'
import { HoleInjectionResult, HoleOptions } from '../types/options'
import { calculateBounds, isEmptyBounds } from '../utils/bounds'
import { formatTenths } from '../utils/format'
import { pointLineDistance } from '../utils/geometry'
import { generateCuttingLines } from './cutting_lines'

export class HoleInjectionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'HoleInjectionError'
  }
}

export function removedComment(point: Point): string {
  return `${REMOVED_COMMENT_PREFIX} X${formatTenths(point.x)} Y${formatTenths(point.y)}\n`
}

export function summaryComment(removed: number): string {
  return `${SUMMARY_COMMENT_PREFIX} ${removed}\n`
}

export class HoleInjector {
  private parser = new GcodeLineParser()

  private validateOptions(options: HoleOptions): void {
    if (!Number.isInteger(options.holeCount) || options.holeCount < 0) {
      throw new HoleInjectionError(
        `Hole count must be a non-negative integer, got ${options.holeCount}`
      )
    }
    if (!Number.isFinite(options.radius)) {
      throw new HoleInjectionError(`Radius must be a finite number, got ${options.radius}`)
    }
    if (!Number.isSafeInteger(options.seed)) {
      throw new HoleInjectionError(`Seed must be an integer, got ${options.seed}`)
    }
  }

  // True if `point` lies within `radius` of any cutting line. Stops at the first hit.
  private isInsideHole(point: Point, cuttingLines: CuttingLine[], radius: number): boolean {
    return cuttingLines.some((line) => pointLineDistance(point, line) <= radius)
  }

  // Comments out extrusion moves near any of `cuttingLines`, then appends the summary.
  public carve(
    lines: readonly string[],
    cuttingLines: CuttingLine[],
    radius: number
  ): { lines: string[]; removed: number } {
    const output: string[] = []
    let removed = 0

    for (const line of lines) {
      const result = this.parser.parseMove(line)
      if (
        result.kind === 'move' &&
        this.parser.isExtrusionMove(line) &&
        this.isInsideHole(result.move, cuttingLines, radius)
      ) {
        output.push(removedComment(result.move))
        removed++
      } else {
        output.push(line)
      }
    }

    output.push(summaryComment(removed))
    return { lines: output, removed }
  }

  /**
   * Replaces every extrusion move within `options.radius` of a random cutting
   * line with a comment, and appends a summary comment.
   *
   * The output always has exactly one more line than `lines`.
   */
  public inject(lines: readonly string[], options: HoleOptions): HoleInjectionResult {
    this.validateOptions(options)

    const bounds = calculateBounds(lines, this.parser)
    if (options.holeCount > 0 && isEmptyBounds(bounds)) {
      throw new HoleInjectionError(
        'Cannot place holes: no G1 moves with X and Y coordinates found'
      )
    }

    const cuttingLines = generateCuttingLines(bounds, options.holeCount, options.seed)
    const { lines: output, removed } = this.carve(lines, cuttingLines, options.radius)

    return { lines: output, removed, bounds, cuttingLines }
  }
}
