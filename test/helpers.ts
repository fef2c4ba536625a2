import crypto from 'crypto'

import { encryptBlock } from '../src/ecb'
import { addPadding, splitBlocks } from '../src/util'
import type { Oracle } from '../src/types'

export const ZERO_KEY = Buffer.alloc(16)
export const TEST_KEY = Buffer.from('test-secret-key!', 'utf8')

// XORs fresh random bytes into every block before encrypting, so equal plaintext blocks never collide
export class RandomizedOracle implements Oracle {
  public constructor(private readonly key: Buffer, private readonly secret: Buffer) {}

  public encrypt(attackerPrefix: Buffer) {
    const padded = addPadding(Buffer.concat([attackerPrefix, this.secret]), 16)
    return Buffer.concat(splitBlocks(padded, 16).map((block) => {
      const mask = crypto.randomBytes(16)
      return encryptBlock(this.key, Buffer.from(block.map((byte, i) => byte ^ mask[i])))
    }))
  }
}

// ignores the prefix entirely
export const constantOracle: Oracle = {
  encrypt: () => Buffer.alloc(32, 0x7f),
}
