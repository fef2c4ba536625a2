import ow from 'ow'
import { range } from 'lodash'

import { filler, splitBlocks } from './util'
import { BlockSizeNotFoundError } from './errors'
import { MAX_BLOCK_SIZE_PROBE } from './constants'
import type { BlockSizeResult, CallOracle } from './types'

// the ciphertext grows by one full block as soon as the prefix pushes the padded
// plaintext past a block boundary; at that point `i + suffixLength` is block aligned
export function findBlockSize(callOracle: CallOracle, maxProbe = MAX_BLOCK_SIZE_PROBE): BlockSizeResult {
  ow(maxProbe, 'maxProbe', ow.number.integer.positive)
  const baselineLength = callOracle(Buffer.alloc(0)).length
  for (const i of range(1, maxProbe + 1)) {
    const newLength = callOracle(filler(i)).length
    if (newLength > baselineLength) {
      return { ok: true, blockSize: newLength - baselineLength, suffixLength: baselineLength - i }
    }
  }
  return { ok: false, error: new BlockSizeNotFoundError(maxProbe) }
}

export const countDuplicateBlocks = (ciphertext: Buffer, blockSize: number) => {
  const blocks = splitBlocks(ciphertext, blockSize).map(block => block.toString('hex'))
  return blocks.length - new Set(blocks).size
}

export function detectEcb(callOracle: CallOracle, blockSize: number) {
  ow(blockSize, 'blockSize', ow.number.integer.positive)
  const ciphertext = callOracle(filler(blockSize * 4))
  return countDuplicateBlocks(ciphertext, blockSize) > 0
}
