import { range } from 'lodash'

import { filler } from './util'
import type { CallOracle } from './types'

/**
 * Maps a ciphertext block to the candidate byte whose probe produced it.
 * Blocks are compared by content only (hex key), never by reference.
 */
export class CipherBlockDictionary {
  private readonly entries = new Map<string, number>()

  public set(block: Buffer, byte: number) {
    this.entries.set(block.toString('hex'), byte)
  }

  public get(block: Buffer) {
    return this.entries.get(block.toString('hex'))
  }

  public get size() {
    return this.entries.size
  }
}

export function getTargetLayout(knownLength: number, blockSize: number) {
  const paddingLength = blockSize - 1 - (knownLength % blockSize)
  const targetBlockOffset = Math.floor(knownLength / blockSize) * blockSize
  return { paddingLength, targetBlockOffset }
}

interface BuildDictionary {
  callOracle: CallOracle
  knownPrefix: Buffer
  blockSize: number
}
export function buildDictionary({ callOracle, knownPrefix, blockSize }: BuildDictionary) {
  const { paddingLength, targetBlockOffset } = getTargetLayout(knownPrefix.length, blockSize)
  const prefix = Buffer.concat([filler(paddingLength), knownPrefix])
  const dictionary = new CipherBlockDictionary()
  for (const candidate of range(0, 256)) {
    const ciphertext = callOracle(Buffer.concat([prefix, Buffer.from([candidate])]))
    if (ciphertext.length >= targetBlockOffset + blockSize) {
      dictionary.set(ciphertext.subarray(targetBlockOffset, targetBlockOffset + blockSize), candidate)
    }
  }
  return dictionary
}
