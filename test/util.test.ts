import { describe, expect, it } from 'vitest'

import { addPadding, byteToHex, displayByte, filler, getPrintable, splitBlocks } from '../src/util'

describe('addPadding', () => {
  it('pads up to the next block boundary with the padding length', () => {
    const padded = addPadding(Buffer.from('green kettle'), 16)
    expect(padded).toEqual(Buffer.concat([Buffer.from('green kettle'), Buffer.from([4, 4, 4, 4])]))
  })

  it('appends a full block when the input is already aligned', () => {
    const padded = addPadding(Buffer.alloc(16, 1), 16)
    expect(padded.length).toBe(32)
    expect(padded.subarray(16)).toEqual(Buffer.alloc(16, 16))
  })

  it('pads an empty input to one block', () => {
    expect(addPadding(Buffer.alloc(0), 8)).toEqual(Buffer.alloc(8, 8))
  })

  it('always grows the input to a positive multiple of the block size', () => {
    for (let length = 0; length < 40; length++) {
      const padded = addPadding(Buffer.alloc(length), 16)
      expect(padded.length).toBeGreaterThan(length)
      expect(padded.length % 16).toBe(0)
    }
  })
})

describe('splitBlocks', () => {
  it('splits into block-sized slices and drops a trailing partial block', () => {
    const blocks = splitBlocks(Buffer.from('aaaabbbbcc'), 4)
    expect(blocks.map(b => b.toString())).toEqual(['aaaa', 'bbbb'])
  })

  it('returns nothing for an empty buffer', () => {
    expect(splitBlocks(Buffer.alloc(0), 16)).toEqual([])
  })
})

describe('byte display', () => {
  it('formats bytes as hex', () => {
    expect(byteToHex(0x5)).toBe('0x05')
    expect(byteToHex(0xff)).toBe('0xff')
  })

  it('shows printable characters as themselves and the rest as hex', () => {
    expect(displayByte(0x53)).toBe('S')
    expect(displayByte(0x20)).toBe(' ')
    expect(displayByte(0x01)).toBe('0x01')
    expect(displayByte(0xc3)).toBe('0xc3')
  })

  it('replaces unprintable characters with dots', () => {
    expect(getPrintable('ab\x01c\n')).toBe('ab.c.')
  })

  it('builds filler out of a single repeated byte', () => {
    expect(filler(3).toString()).toBe('AAA')
  })
})
