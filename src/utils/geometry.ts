import { Point } from '../types/base'
import { CuttingLine } from '../types/gcode'
import { dotProduct } from './vector'

export class GeometryError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'GeometryError'
  }
}

/**
 * Perpendicular distance from a point to the infinite line through
 * `line.origin` along `line.direction`.
 *
 * The direction does not need to be a unit vector, but it must be non-zero.
 */
export function pointLineDistance(point: Point, line: CuttingLine): number {
  const { origin, direction } = line
  const lengthSquared = dotProduct(direction, direction)
  if (lengthSquared === 0) {
    throw new GeometryError('Cutting line direction must be non-zero')
  }

  const offset = { x: point.x - origin.x, y: point.y - origin.y }
  const t = dotProduct(offset, direction) / lengthSquared

  const nearestX = origin.x + t * direction.x
  const nearestY = origin.y + t * direction.y
  const dx = point.x - nearestX
  const dy = point.y - nearestY
  return Math.sqrt(dx * dx + dy * dy)
}
