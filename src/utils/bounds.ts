import { BoundingBox } from '../types/base'
import { GcodeLineParser } from '../parsers/move'

export function emptyBounds(): BoundingBox {
  return { minX: Infinity, maxX: -Infinity, minY: Infinity, maxY: -Infinity }
}

export function isEmptyBounds(bounds: BoundingBox): boolean {
  return bounds.minX > bounds.maxX || bounds.minY > bounds.maxY
}

// XY extent of every line that parses as a move. Lines that don't are skipped.
export function calculateBounds(
  lines: readonly string[],
  parser: GcodeLineParser = new GcodeLineParser()
): BoundingBox {
  const bounds = emptyBounds()

  for (const line of lines) {
    const result = parser.parseMove(line)
    if (result.kind === 'none') continue

    const { x, y } = result.move
    bounds.minX = Math.min(bounds.minX, x)
    bounds.maxX = Math.max(bounds.maxX, x)
    bounds.minY = Math.min(bounds.minY, y)
    bounds.maxY = Math.max(bounds.maxY, y)
  }

  return bounds
}
