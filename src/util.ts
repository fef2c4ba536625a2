import { range } from 'lodash'
import { FILLER_BYTE } from './constants'

export function addPadding(input: Buffer, blockSize: number) {
  const n = blockSize - (input.length % blockSize)
  return Buffer.concat([input, Buffer.alloc(n, n)])
}

export const filler = (length: number) => Buffer.alloc(length, FILLER_BYTE)

export const splitBlocks = (buffer: Buffer, blockSize: number) => range(0, buffer.length - blockSize + 1, blockSize)
  .map(offset => buffer.subarray(offset, offset + blockSize))

export const getPrintable = (str: string) => str.replace(/[^\x20-\x7e]/g, '.')

const isDisplayable = (byte: number) => (byte >= 0x20 && byte <= 0x7e) || byte === 0x09 || byte === 0x0a || byte === 0x0d

export const byteToHex = (byte: number) => '0x' + byte.toString(16).padStart(2, '0')

export function displayByte(byte: number) {
  if (!isDisplayable(byte)) return byteToHex(byte)
  return String.fromCharCode(byte)
}
