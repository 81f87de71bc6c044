// Formats to one decimal place, rounding exact ties to the even digit
// (10.25 -> "10.2", 0.75 -> "0.8"). Only values ending in .25 or .75 are
// exact ties in binary; everything else is already correct under toFixed.
export function formatTenths(value: number): string {
  if (Object.is(value, -0)) {
    return '-0.0'
  }

  const isTie = Number.isInteger(value * 4) && !Number.isInteger(value * 2)
  if (!isTie) {
    return value.toFixed(1)
  }

  const lower = Math.floor(value * 10)
  const tenths = lower % 2 === 0 ? lower : lower + 1
  return (tenths / 10).toFixed(1)
}
