import attack, { runEcbDemo } from './attack'
import analyseOracle from './response-analysis'

export { attack, runEcbDemo, analyseOracle }
export { EncryptionOracle } from './oracle'
export { ecbEncrypt, encryptBlock } from './ecb'
export { findBlockSize, detectEcb } from './detect'
export { buildDictionary, CipherBlockDictionary } from './dictionary'
export { default as ByteAtATime } from './byte-at-a-time'
export { default as OracleCaller } from './oracle-caller'
export { addPadding } from './util'
export { InvalidKeyLengthError, BlockSizeNotFoundError } from './errors'
export type {
  Oracle, OracleStats, AttackOptions, AttackResult, AttackStatus, BlockSizeResult, DemoOptions, LogMode, ResponseAnalysisOptions
} from './types'
