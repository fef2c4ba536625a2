import crypto from 'crypto'

import { addPadding, splitBlocks } from './util'
import { AES_ALGORITHM, AES_BLOCK_SIZE } from './constants'

export function encryptBlock(key: Buffer, block: Buffer) {
  if (block.length !== AES_BLOCK_SIZE) throw TypeError(`Invalid block, should have length equal to ${AES_BLOCK_SIZE}`)
  const cipher = crypto.createCipheriv(AES_ALGORITHM, key, null)
  cipher.setAutoPadding(false)
  return Buffer.concat([cipher.update(block), cipher.final()])
}

// no IV, no chaining: equal plaintext blocks encrypt to equal ciphertext blocks
export function ecbEncrypt(key: Buffer, plaintext: Buffer) {
  const padded = addPadding(plaintext, AES_BLOCK_SIZE)
  return Buffer.concat(splitBlocks(padded, AES_BLOCK_SIZE).map(block => encryptBlock(key, block)))
}
