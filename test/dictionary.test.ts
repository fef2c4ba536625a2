import { describe, expect, it } from 'vitest'

import { CipherBlockDictionary, buildDictionary, getTargetLayout } from '../src/dictionary'
import { EncryptionOracle } from '../src/oracle'
import { filler } from '../src/util'
import { ZERO_KEY } from './helpers'

const oracle = new EncryptionOracle(ZERO_KEY, Buffer.from('SECRETDATA'))
const callOracle = (prefix: Buffer) => oracle.encrypt(prefix)

describe('CipherBlockDictionary', () => {
  it('looks blocks up by content', () => {
    const dictionary = new CipherBlockDictionary()
    dictionary.set(Buffer.from('ab'), 7)
    expect(dictionary.get(Buffer.from([0x61, 0x62]))).toBe(7)
    expect(dictionary.get(Buffer.from('ba'))).toBeUndefined()
    expect(dictionary.size).toBe(1)
  })
})

describe('getTargetLayout', () => {
  it('puts the next unknown byte at the end of a block', () => {
    expect(getTargetLayout(0, 16)).toEqual({ paddingLength: 15, targetBlockOffset: 0 })
    expect(getTargetLayout(15, 16)).toEqual({ paddingLength: 0, targetBlockOffset: 0 })
    expect(getTargetLayout(16, 16)).toEqual({ paddingLength: 15, targetBlockOffset: 16 })
    expect(getTargetLayout(17, 16)).toEqual({ paddingLength: 14, targetBlockOffset: 16 })
  })
})

describe('buildDictionary', () => {
  it('has one entry per candidate byte', () => {
    const dictionary = buildDictionary({ callOracle, knownPrefix: Buffer.alloc(0), blockSize: 16 })
    expect(dictionary.size).toBe(256)
  })

  it('maps the target block to the next secret byte', () => {
    const knownPrefix = Buffer.from('SECR')
    const dictionary = buildDictionary({ callOracle, knownPrefix, blockSize: 16 })
    const targetBlock = callOracle(filler(11)).subarray(0, 16)
    expect(dictionary.get(targetBlock)).toBe(0x45)
  })

  it('works on blocks after the first one', () => {
    const longOracle = new EncryptionOracle(ZERO_KEY, Buffer.from('0123456789abcdefXYZ'))
    const knownPrefix = Buffer.from('0123456789abcdefX')
    const dictionary = buildDictionary({ callOracle: p => longOracle.encrypt(p), knownPrefix, blockSize: 16 })
    const targetBlock = longOracle.encrypt(filler(14)).subarray(16, 32)
    expect(dictionary.get(targetBlock)).toBe(0x59)
  })

  it('skips candidates whose ciphertext is too short', () => {
    const shortOracle = () => Buffer.alloc(16)
    const dictionary = buildDictionary({ callOracle: shortOracle, knownPrefix: Buffer.alloc(16), blockSize: 16 })
    expect(dictionary.size).toBe(0)
  })
})
