#!/usr/bin/env node
import crypto from 'crypto'
import minimist from 'minimist'
import chalk from 'chalk'

import { runEcbDemo } from './attack'
import analyzeFunc from './response-analysis'
import { EncryptionOracle } from './oracle'
import { encryption, logError } from './logging'
import { AES_BLOCK_SIZE, PKG_NAME, PKG_VERSION } from './constants'
import type { LogMode } from './types'

const argv = minimist(process.argv.slice(2), {
  string: ['_', 'prefix', 'log-mode', 'max-probe'],
  boolean: ['version', 'dont-save-responses'],
  alias: {
    v: 'version',
    p: 'prefix',
    m: 'log-mode'
  }
})

const USAGE = chalk`
  {inverse Usage}
    {gray $} ecb-oracle-attacker crack   <key> <secret>    [options]
    {gray $} ecb-oracle-attacker encrypt <key> <plaintext> [options]
    {gray $} ecb-oracle-attacker analyze <key> <secret>    [options]

  {inverse Commands}
    crack                    Recovers the secret appended by an ECB encryption oracle, one byte
                             at a time, without using the key after building the oracle
    encrypt                  Encrypts the plaintext with AES-128-ECB and PKCS#7 padding
    analyze                  Probes the oracle with growing prefixes and reports ciphertext
                             lengths, repeated blocks and the likely block size

  {inverse Arguments}
    <key>                    16 byte key for the oracle, or {underline random}. Accepts hex:, b64:, utf8:
    <secret>                 Secret the oracle appends to every input. Accepts hex:, b64:, utf8:
    <plaintext>              Plaintext to encrypt. Accepts hex:, b64:, utf8:

  {inverse Options}
    -p, --prefix             Attacker input placed before the secret in the
                             reported ciphertext                                   [default: ""]
    -m, --log-mode           full, minimal or none                                 [default: full]
        --max-probe          Longest prefix tried while probing the block size     [default: 64]
        --dont-save-responses
                             Don't save analyzed ciphertexts to a temp dir         [default: false]
    -v, --version            Print the version

  {inverse Examples}
    {gray $} ecbattack crack hex:00000000000000000000000000000000 SECRETDATA
    {gray $} ecbattack crack random "attack at dawn" -p "hello"
    {gray $} ecbattack encrypt utf8:paper-lantern-16 hex:00112233
    {gray $} ecbattack analyze random SECRETDATA

  {inverse Aliases}
    ecbattack
`

const LOG_MODES: LogMode[] = ['full', 'minimal', 'none']
const isLogMode = (mode: string): mode is LogMode => LOG_MODES.some(m => m === mode)

const hexToBuffer = (str: string) => Buffer.from(str.replace(/\s+/g, ''), 'hex')
const b64ToBuffer = (str: string) => Buffer.from(str.replace(/\s+/g, ''), 'base64')
function strToBuffer(input: string) {
  if (input.startsWith('hex:')) return hexToBuffer(input.slice('hex:'.length))
  if (input.startsWith('base64:')) return b64ToBuffer(input.slice('base64:'.length))
  if (input.startsWith('b64:')) return b64ToBuffer(input.slice('b64:'.length))
  if (input.startsWith('utf8:')) return Buffer.from(input.slice('utf8:'.length), 'utf8')
  return Buffer.from(input, 'utf8')
}
const keyToBuffer = (input: string) => (input === 'random' ? crypto.randomBytes(AES_BLOCK_SIZE) : strToBuffer(input))

async function main() {
  const [operation, keyArg, thirdArg] = argv._
  if (argv.version) {
    console.log(PKG_NAME, 'v' + PKG_VERSION)
    return
  }
  const isCrack = operation === 'crack'
  const isEncrypt = operation === 'encrypt'
  const isAnalyze = ['analyze', 'analyse'].includes(operation)
  const prefix: unknown = argv.prefix
  const logModeArg: unknown = argv['log-mode']
  const maxProbeArg: unknown = argv['max-probe']
  if ((!isCrack && !isEncrypt && !isAnalyze) || !keyArg || thirdArg === undefined || Array.isArray(prefix) || Array.isArray(logModeArg)) {
    console.error(USAGE)
    return
  }
  const logMode = typeof logModeArg === 'string' ? logModeArg : 'full'
  if (!isLogMode(logMode)) {
    console.error(chalk`{red Invalid argument:} --log-mode\nMust be one of ${LOG_MODES.join(', ')}`)
    return
  }
  const maxProbe = typeof maxProbeArg === 'string' ? Number(maxProbeArg) : undefined
  if (maxProbe !== undefined && (!Number.isInteger(maxProbe) || maxProbe < 1)) {
    console.error(chalk`{red Invalid argument:} --max-probe\nMust be a positive integer`)
    return
  }
  const key = keyToBuffer(keyArg)
  const secretOrPlaintext = strToBuffer(thirdArg)
  if (isCrack) {
    const attackerInput = strToBuffer(typeof prefix === 'string' ? prefix : '')
    const { status, steps } = runEcbDemo({ key, secret: secretOrPlaintext, attackerInput, maxBlockSizeProbe: maxProbe, logMode })
    if (status === 'aborted') {
      if (logMode === 'none') console.error(steps.join('\n'))
      process.exitCode = 1
    }
  } else if (isEncrypt) {
    const oracle = new EncryptionOracle(key, Buffer.alloc(0))
    const ciphertext = oracle.encrypt(secretOrPlaintext)
    if (logMode === 'none') console.log(ciphertext.toString('hex'))
    else encryption.logCompletion({ plaintext: secretOrPlaintext, ciphertext, blockSize: AES_BLOCK_SIZE })
  } else if (isAnalyze) {
    const oracle = new EncryptionOracle(key, secretOrPlaintext)
    await analyzeFunc({ oracle, maxProbe, logMode, saveResponsesToTmpDir: !argv['dont-save-responses'] })
  }
}

main().catch(logError)
