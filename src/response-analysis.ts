import path from 'path'
import ow from 'ow'
import fse from 'fs-extra'
import tmp from 'tmp-promise'
import { range, countBy, max } from 'lodash'

import { analysis } from './logging'
import OracleCaller from './oracle-caller'
import { countDuplicateBlocks } from './detect'
import { filler } from './util'
import { MAX_BLOCK_SIZE_PROBE } from './constants'
import type { ResponseAnalysisOptions } from './types'

const { logStart, logCompletion } = analysis

export interface ProbeResult {
  prefixLength: number
  ciphertext: Buffer
  duplicateBlocks: number
}

const getProbeText = (probe: ProbeResult) => `# prefix length: ${probe.prefixLength}
# duplicate blocks: ${probe.duplicateBlocks}
${probe.ciphertext.toString('hex')}
`

// smallest positive jump between consecutive ciphertext lengths
export function guessBlockSize(ciphertextLengths: number[]) {
  const jumps = range(1, ciphertextLengths.length)
    .map(i => ciphertextLengths[i] - ciphertextLengths[i - 1])
    .filter(jump => jump > 0)
  return jumps.length ? Math.min(...jumps) : undefined
}

async function analyseOracle({
  oracle, maxProbe = MAX_BLOCK_SIZE_PROBE, logMode = 'full', saveResponsesToTmpDir = true
}: ResponseAnalysisOptions) {
  ow(maxProbe, 'maxProbe', ow.number.integer.positive)

  const tmpDirPath = saveResponsesToTmpDir ? (await tmp.dir({ prefix: 'ecbattack_' })).path : ''
  if (['full', 'minimal'].includes(logMode)) logStart({ maxProbe, tmpDirPath })

  const { callOracle, oracleStats } = OracleCaller(oracle)

  const lengths = range(0, maxProbe + 1).map(prefixLength => ({ prefixLength, ciphertext: callOracle(filler(prefixLength)) }))
  const blockSizeGuess = guessBlockSize(lengths.map(probe => probe.ciphertext.length))
  const probes: ProbeResult[] = lengths.map(probe => ({
    ...probe,
    duplicateBlocks: blockSizeGuess ? countDuplicateBlocks(probe.ciphertext, blockSizeGuess) : 0
  }))

  if (saveResponsesToTmpDir) {
    await Promise.all(probes.map(probe => fse.writeFile(path.join(tmpDirPath, `${probe.prefixLength}.txt`), getProbeText(probe))))
  }

  const lengthFreq = countBy(probes, probe => probe.ciphertext.length)
  const maxDuplicateBlocks = max(probes.map(probe => probe.duplicateBlocks)) || 0
  if (['full', 'minimal'].includes(logMode)) {
    const probesTable = probes.map(probe => [String(probe.prefixLength), String(probe.ciphertext.length), String(probe.duplicateBlocks)])
    logCompletion({ probesTable, lengthFreq, blockSizeGuess, maxDuplicateBlocks, tmpDirPath, oracleStats })
  }
  return { probes, lengthFreq, blockSizeGuess, isLikelyEcb: maxDuplicateBlocks > 0, tmpDirPath }
}

export default analyseOracle
