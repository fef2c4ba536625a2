import ow from 'ow'

import { attack as attackLogging, logWarning } from './logging'
import ByteAtATime from './byte-at-a-time'
import OracleCaller from './oracle-caller'
import { EncryptionOracle } from './oracle'
import { detectEcb, findBlockSize } from './detect'
import { InvalidKeyLengthError } from './errors'
import { AES_BLOCK_SIZE } from './constants'
import type { AttackOptions, AttackResult, AttackStatus, DemoOptions } from './types'

const { logStart, logPhase, logCompletion } = attackLogging

function attack({ oracle, attackerInput = Buffer.alloc(0), maxBlockSizeProbe, logMode = 'full' }: AttackOptions): AttackResult {
  ow(attackerInput, 'attackerInput', ow.buffer)
  ow(logMode, 'logMode', ow.string.oneOf(['full', 'minimal', 'none']))

  const isLogging = ['full', 'minimal'].includes(logMode)
  const { callOracle, oracleStats } = OracleCaller(oracle)
  const steps: string[] = []
  const addStep = (step: string) => {
    steps.push(step)
    if (isLogging) logPhase(step)
  }
  let status: AttackStatus = 'initializing'
  const finish = (result: Omit<AttackResult, 'status' | 'steps' | 'oracleStats'>): AttackResult => {
    if (isLogging) logCompletion({ recovered: result.recovered, steps, oracleStats })
    return { status, steps, oracleStats, ...result }
  }

  const ciphertext = callOracle(attackerInput)
  if (isLogging) logStart({ ciphertext, attackerInput })
  addStep(`Ciphertext length: ${ciphertext.length} bytes`)

  status = 'probing-block-size'
  const blockSizeResult = findBlockSize(callOracle, maxBlockSizeProbe)
  if (!blockSizeResult.ok) {
    status = 'aborted'
    addStep(`${blockSizeResult.error.message}; aborting attack`)
    return finish({ ciphertext, recovered: Buffer.alloc(0), isEcb: false })
  }
  const { blockSize, suffixLength } = blockSizeResult
  addStep(`Detected block size: ${blockSize}`)

  status = 'detecting-ecb'
  if (!detectEcb(callOracle, blockSize)) {
    status = 'aborted'
    addStep('ECB not detected; aborting attack')
    return finish({ ciphertext, recovered: Buffer.alloc(0), blockSize, isEcb: false })
  }
  addStep('ECB detected via repeated-block heuristic')

  status = 'cracking'
  addStep(`Beginning byte-at-a-time recovery (unknown length approx ${suffixLength})`)
  const { processBytes } = ByteAtATime({
    callOracle,
    oracleStats,
    blockSize,
    suffixLength,
    maxIterations: ciphertext.length,
    onStep: step => steps.push(step),
    logMode
  })
  const recovered = processBytes()

  status = 'done'
  return finish({ ciphertext, recovered, blockSize, isEcb: true })
}

export function runEcbDemo({ key, secret, attackerInput = Buffer.alloc(0), maxBlockSizeProbe, logMode = 'none' }: DemoOptions): AttackResult {
  ow(key, 'key', ow.buffer)
  ow(secret, 'secret', ow.buffer)
  if (key.length !== AES_BLOCK_SIZE) {
    const { message } = new InvalidKeyLengthError(key.length, AES_BLOCK_SIZE)
    if (['full', 'minimal'].includes(logMode)) logWarning(message)
    return {
      status: 'aborted',
      ciphertext: Buffer.alloc(0),
      recovered: Buffer.alloc(0),
      steps: [message],
      isEcb: false,
      oracleStats: { count: 0, bytesUp: 0, bytesDown: 0 }
    }
  }
  const oracle = new EncryptionOracle(key, secret)
  return attack({ oracle, attackerInput, maxBlockSizeProbe, logMode })
}

export default attack
