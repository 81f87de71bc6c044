import { Vector } from '../types/base'

export function dotProduct(v1: Vector, v2: Vector): number {
  return v1.x * v2.x + v1.y * v2.y
}

// Unit vector at `angle` radians anticlockwise from +X.
export function vectorFromAngle(angle: number): Vector {
  return { x: Math.cos(angle), y: Math.sin(angle) }
}
