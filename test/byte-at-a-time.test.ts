import { describe, expect, it } from 'vitest'

import ByteAtATime from '../src/byte-at-a-time'
import OracleCaller from '../src/oracle-caller'
import { EncryptionOracle } from '../src/oracle'
import { TEST_KEY, ZERO_KEY } from './helpers'

function setup(secret: Buffer, { suffixLength = secret.length, maxIterations = 64 } = {}) {
  const { callOracle, oracleStats } = OracleCaller(new EncryptionOracle(ZERO_KEY, secret))
  const steps: string[] = []
  const cracker = ByteAtATime({
    callOracle, oracleStats, blockSize: 16, suffixLength, maxIterations, logMode: 'none', onStep: step => steps.push(step)
  })
  return { ...cracker, oracleStats, steps }
}

describe('crackNextByte', () => {
  it('recovers the byte following the known prefix', () => {
    const { crackNextByte } = setup(Buffer.from('SECRETDATA'))
    expect(crackNextByte(Buffer.alloc(0))).toBe(0x53)
    expect(crackNextByte(Buffer.from('SECRET'))).toBe(0x44)
  })

  it('makes one target call plus one call per candidate', () => {
    const { crackNextByte, oracleStats } = setup(Buffer.from('SECRETDATA'))
    crackNextByte(Buffer.alloc(0))
    expect(oracleStats.count).toBe(257)
  })

  it('returns nothing once the known prefix covers the secret', () => {
    const { crackNextByte, oracleStats } = setup(Buffer.from('SECRETDATA'))
    expect(crackNextByte(Buffer.from('SECRETDATA'))).toBeUndefined()
    expect(oracleStats.count).toBe(0)
  })
})

describe('processBytes', () => {
  it('recovers a secret spanning several blocks', () => {
    const secret = Buffer.from('The lighthouse keeper logs every ship that passes at dusk.')
    const { processBytes } = setup(secret, { maxIterations: 80 })
    expect(processBytes()).toEqual(secret)
  })

  it('recovers arbitrary bytes, including ones that look like padding', () => {
    const secret = Buffer.from('00ff10aa0101', 'hex')
    const { processBytes } = setup(secret)
    expect(processBytes().toString('hex')).toBe('00ff10aa0101')
  })

  it('reports every recovered byte and the final miss', () => {
    const { processBytes, steps } = setup(Buffer.from('Hi!'))
    processBytes()
    expect(steps).toEqual([
      'Recovered byte 1: 0x48 (H)',
      'Recovered byte 2: 0x69 (i)',
      'Recovered byte 3: 0x21 (!)',
      'No matching byte found; likely end of secret or padding reached',
    ])
  })

  it('stops on a dictionary miss once padding bytes stop matching', () => {
    const { processBytes, steps } = setup(Buffer.from('SECRETDATA'), { suffixLength: 20 })
    expect(processBytes()).toEqual(Buffer.from('SECRETDATA\x01'))
    expect(steps[steps.length - 1]).toBe('No matching byte found; likely end of secret or padding reached')
  })

  it('never runs more iterations than allowed', () => {
    const { processBytes, steps } = setup(Buffer.from('SECRETDATA'), { maxIterations: 4 })
    expect(processBytes()).toEqual(Buffer.from('SECR'))
    expect(steps).toHaveLength(5)
    expect(steps[4]).toBe('Iteration bound of 4 reached; stopping recovery')
  })

  it('validates its options', () => {
    const { callOracle, oracleStats } = OracleCaller(new EncryptionOracle(TEST_KEY, Buffer.alloc(0)))
    expect(() => ByteAtATime({ callOracle, oracleStats, blockSize: 0, suffixLength: 0, maxIterations: 1 })).toThrow()
  })
})
