export class InvalidKeyLengthError extends Error {
  public readonly keyLength: number
  public readonly expected: number

  public constructor(keyLength: number, expected: number) {
    super(`Invalid key length: ${keyLength} (expected ${expected})`)
    this.name = 'InvalidKeyLengthError'
    this.keyLength = keyLength
    this.expected = expected
  }
}

export class BlockSizeNotFoundError extends Error {
  public readonly maxProbe: number

  public constructor(maxProbe: number) {
    super(`Could not find block size within ${maxProbe} bytes`)
    this.name = 'BlockSizeNotFoundError'
    this.maxProbe = maxProbe
  }
}
