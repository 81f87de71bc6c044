import { BoundingBox } from '../types/base'
import { CuttingLine } from '../types/gcode'
import { SeededRandom } from '../utils/random'
import { vectorFromAngle } from '../utils/vector'

// Generates `count` random lines across `bounds`. For a given seed the
// draws are x, then y, then angle, per line, so output is reproducible.
export function generateCuttingLines(
  bounds: BoundingBox,
  count: number,
  seed: number
): CuttingLine[] {
  const rng = new SeededRandom(seed)
  const lines: CuttingLine[] = []

  for (let i = 0; i < count; i++) {
    const x = rng.uniform(bounds.minX, bounds.maxX)
    const y = rng.uniform(bounds.minY, bounds.maxY)
    const angle = rng.uniform(0, 2 * Math.PI)

    lines.push({ origin: { x, y }, direction: vectorFromAngle(angle) })
  }

  return lines
}
