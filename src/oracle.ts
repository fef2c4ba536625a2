import ow from 'ow'

import { ecbEncrypt } from './ecb'
import { InvalidKeyLengthError } from './errors'
import { AES_BLOCK_SIZE } from './constants'
import type { Oracle } from './types'

export class EncryptionOracle implements Oracle {
  private readonly key: Buffer
  private readonly secret: Buffer

  public constructor(key: Buffer, secret: Buffer) {
    ow(key, 'key', ow.buffer)
    ow(secret, 'secret', ow.buffer)
    if (key.length !== AES_BLOCK_SIZE) throw new InvalidKeyLengthError(key.length, AES_BLOCK_SIZE)
    this.key = Buffer.from(key)
    this.secret = Buffer.from(secret)
  }

  public encrypt(attackerPrefix: Buffer) {
    return ecbEncrypt(this.key, Buffer.concat([attackerPrefix, this.secret]))
  }
}
