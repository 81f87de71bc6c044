export type Point = {
  x: number
  y: number
}

export type Vector = {
  x: number
  y: number
}

// Axis-aligned XY extent of a toolpath. Inverted (+Infinity/-Infinity) when empty.
export type BoundingBox = {
  minX: number
  maxX: number
  minY: number
  maxY: number
}
