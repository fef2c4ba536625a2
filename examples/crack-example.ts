import { runEcbDemo } from '../src'

const key = Buffer.alloc(16)
const secret = Buffer.from('meet me by the old mill at half past nine', 'utf8')

// optional: attacker input shown in front of the secret in the reported ciphertext
const attackerInput = Buffer.from('hello', 'utf8')

const { recovered, steps } = runEcbDemo({ key, secret, attackerInput, logMode: 'minimal' })
console.log(steps.length, 'steps', recovered.toString('utf8'))
