import ow from 'ow'

import type { Oracle, OracleStats } from './types'

const OracleCaller = (oracle: Oracle) => {
  ow(oracle, 'oracle', ow.object.hasKeys('encrypt'))

  const oracleStats: OracleStats = { count: 0, bytesUp: 0, bytesDown: 0 }

  function callOracle(attackerPrefix: Buffer) {
    const ciphertext = oracle.encrypt(attackerPrefix)
    oracleStats.count++
    oracleStats.bytesUp += attackerPrefix.length
    oracleStats.bytesDown += ciphertext.length
    return ciphertext
  }
  return { oracleStats, callOracle }
}

export default OracleCaller
