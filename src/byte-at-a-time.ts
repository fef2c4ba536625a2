import ow from 'ow'

import { logProgress } from './logging'
import { buildDictionary, getTargetLayout } from './dictionary'
import { byteToHex, displayByte, filler } from './util'
import type { ByteCrackerOptions } from './types'

const ByteAtATime = (options: ByteCrackerOptions) => {
  const {
    callOracle, oracleStats, blockSize, suffixLength, maxIterations,
    onStep = () => undefined, logMode = 'full'
  } = options
  ow(blockSize, 'blockSize', ow.number.integer.positive)
  ow(suffixLength, 'suffixLength', ow.number.integer.greaterThanOrEqual(0))
  ow(maxIterations, 'maxIterations', ow.number.integer.greaterThanOrEqual(0))
  ow(logMode, ow.string.oneOf(['full', 'minimal', 'none']))

  // returns undefined on a dictionary miss: the secret is exhausted or padding was reached
  function crackNextByte(knownBytes: Buffer) {
    // past the suffix the target byte can only be padding
    if (knownBytes.length >= suffixLength) return undefined
    const { paddingLength, targetBlockOffset } = getTargetLayout(knownBytes.length, blockSize)
    const targetCiphertext = callOracle(filler(paddingLength))
    if (targetCiphertext.length < targetBlockOffset + blockSize) return undefined
    const targetBlock = targetCiphertext.subarray(targetBlockOffset, targetBlockOffset + blockSize)

    const dictionary = buildDictionary({ callOracle, knownPrefix: knownBytes, blockSize })
    return dictionary.get(targetBlock)
  }

  function processBytes() {
    let recovered = Buffer.alloc(0)
    for (let i = 0; i < maxIterations; i++) {
      const byte = crackNextByte(recovered)
      if (byte === undefined) {
        onStep('No matching byte found; likely end of secret or padding reached')
        return recovered
      }
      recovered = Buffer.concat([recovered, Buffer.from([byte])])
      onStep(`Recovered byte ${recovered.length}: ${byteToHex(byte)} (${displayByte(byte)})`)
      if (logMode === 'full') logProgress({ recovered, blockSize, suffixLength, byte, oracleStats })
    }
    onStep(`Iteration bound of ${maxIterations} reached; stopping recovery`)
    return recovered
  }
  return { crackNextByte, processBytes }
}

export default ByteAtATime
