import type { BlockSizeNotFoundError } from './errors';

export type LogMode = 'full' | 'minimal' | 'none';

export interface Oracle {
  encrypt(attackerPrefix: Buffer): Buffer;
}
export type CallOracle = (attackerPrefix: Buffer) => Buffer;

export interface OracleStats {
  count: number;
  bytesUp: number;
  bytesDown: number;
}

export type BlockSizeResult =
  | { ok: true; blockSize: number; suffixLength: number }
  | { ok: false; error: BlockSizeNotFoundError };

export type AttackStatus = 'initializing' | 'probing-block-size' | 'detecting-ecb' | 'cracking' | 'done' | 'aborted';

export interface AttackResult {
  status: AttackStatus;
  ciphertext: Buffer;
  recovered: Buffer;
  steps: string[];
  blockSize?: number;
  isEcb: boolean;
  oracleStats: OracleStats;
}

interface OptionsBase {
  logMode?: LogMode;
}
export interface AttackOptions extends OptionsBase {
  oracle: Oracle;
  attackerInput?: Buffer;
  maxBlockSizeProbe?: number;
}
export interface DemoOptions extends OptionsBase {
  key: Buffer;
  secret: Buffer;
  attackerInput?: Buffer;
  maxBlockSizeProbe?: number;
}
export interface ByteCrackerOptions extends OptionsBase {
  callOracle: CallOracle;
  oracleStats: OracleStats;
  blockSize: number;
  suffixLength: number;
  maxIterations: number;
  onStep?: (step: string) => void;
}
export interface ResponseAnalysisOptions extends OptionsBase {
  oracle: Oracle;
  maxProbe?: number;
  saveResponsesToTmpDir?: boolean;
}
