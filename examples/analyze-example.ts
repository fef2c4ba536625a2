import crypto from 'crypto'
import { analyseOracle, EncryptionOracle } from '../src'

const oracle = new EncryptionOracle(crypto.randomBytes(16), Buffer.from('{"admin":false}', 'utf8'))

analyseOracle({
  oracle,
  maxProbe: 48,
  saveResponsesToTmpDir: false,
}).catch(console.error)
