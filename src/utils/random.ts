// MT19937 Mersenne Twister, seeded from an integer the same way CPython's
// `random.seed(int)` is, so a given seed yields the same sequence in both.

const N = 624
const M = 397
const MATRIX_A = 0x9908b0df
const UPPER_MASK = 0x80000000
const LOWER_MASK = 0x7fffffff

const TWO_POW_32 = 0x100000000

export class SeededRandom {
  private mt = new Uint32Array(N)
  private index = N + 1

  constructor(seed: number) {
    this.seed(seed)
  }

  public seed(seed: number): void {
    if (!Number.isSafeInteger(seed)) {
      throw new RangeError(`Seed must be a safe integer, got ${seed}`)
    }
    this.initByArray(SeededRandom.seedToKey(seed))
  }

  // Splits |seed| into little-endian 32-bit words. Zero becomes [0].
  private static seedToKey(seed: number): number[] {
    let remaining = Math.abs(seed)
    const key: number[] = []
    while (remaining > 0) {
      key.push(remaining % TWO_POW_32)
      remaining = Math.floor(remaining / TWO_POW_32)
    }
    return key.length > 0 ? key : [0]
  }

  private initGenrand(s: number): void {
    const mt = this.mt
    mt[0] = s >>> 0
    for (let i = 1; i < N; i++) {
      const prev = mt[i - 1] ^ (mt[i - 1] >>> 30)
      mt[i] = (Math.imul(1812433253, prev) + i) >>> 0
    }
    this.index = N
  }

  private initByArray(key: number[]): void {
    const mt = this.mt
    this.initGenrand(19650218)

    let i = 1
    let j = 0
    for (let k = Math.max(N, key.length); k > 0; k--) {
      const prev = mt[i - 1] ^ (mt[i - 1] >>> 30)
      mt[i] = ((mt[i] ^ Math.imul(prev, 1664525)) + key[j] + j) >>> 0
      i++
      j++
      if (i >= N) {
        mt[0] = mt[N - 1]
        i = 1
      }
      if (j >= key.length) {
        j = 0
      }
    }
    for (let k = N - 1; k > 0; k--) {
      const prev = mt[i - 1] ^ (mt[i - 1] >>> 30)
      mt[i] = ((mt[i] ^ Math.imul(prev, 1566083941)) - i) >>> 0
      i++
      if (i >= N) {
        mt[0] = mt[N - 1]
        i = 1
      }
    }

    // MSB is 1, assuring a non-zero initial array.
    mt[0] = 0x80000000
  }

  private twist(): void {
    const mt = this.mt
    for (let kk = 0; kk < N; kk++) {
      const y = (mt[kk] & UPPER_MASK) | (mt[(kk + 1) % N] & LOWER_MASK)
      mt[kk] = (mt[(kk + M) % N] ^ (y >>> 1) ^ (y & 1 ? MATRIX_A : 0)) >>> 0
    }
    this.index = 0
  }

  public nextUint32(): number {
    if (this.index >= N) {
      this.twist()
    }

    let y = this.mt[this.index++]
    y ^= y >>> 11
    y ^= (y << 7) & 0x9d2c5680
    y ^= (y << 15) & 0xefc60000
    y ^= y >>> 18
    return y >>> 0
  }

  // Uniform double in [0, 1) with 53 bits of precision.
  public random(): number {
    const a = this.nextUint32() >>> 5
    const b = this.nextUint32() >>> 6
    return (a * 67108864 + b) / 9007199254740992
  }

  public uniform(a: number, b: number): number {
    return a + (b - a) * this.random()
  }
}
