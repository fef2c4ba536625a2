import chalk from 'chalk';
import wrapAnsi from 'wrap-ansi';
import logUpdate from 'log-update';
import ansiStyles from 'ansi-styles';
import prettyBytes from 'pretty-bytes';
import { table, getBorderCharacters } from 'table';
import type { TableUserConfig } from 'table';
import { getPrintable } from './util';
import type { OracleStats } from './types';

function getBar(percent: number, barSize: number) {
  const barComplete = '█'.repeat(Math.floor(percent * barSize));
  const barIncomplete = '░'.repeat(barSize - barComplete.length);
  return { barComplete, barIncomplete };
}

type HexColor = 'gray' | 'green' | 'yellow';
interface ColorizeHex {
  plainHex: string;
  totalSize: number;
  foundSize: number;
}
// recovered bytes green, the newest one yellow, unknown ones as gray dots
function colorizeHex({ plainHex, totalSize, foundSize }: ColorizeHex) {
  let result = '';
  let lastColor: HexColor | undefined;
  for (let i = 0; i < totalSize; i++) {
    let color: HexColor = 'gray';
    if (i === foundSize - 1) color = 'yellow';
    else if (i < foundSize) color = 'green';

    const byteHex = i < foundSize ? plainHex.slice(i * 2, i * 2 + 2) : '..';
    if (lastColor !== color) {
      result += (lastColor ? ansiStyles[lastColor].close : '') + ansiStyles[color].open;
      lastColor = color;
    }
    result += byteHex;
  }
  if (lastColor) result += ansiStyles[lastColor].close;
  return result;
}

const log = (...text: string[]) => (process.stdout.isTTY ? logUpdate(...text) : console.log(...text));
const wrapAndSplit = (text: string, size: number) => wrapAnsi(text, size, { hard: true }).split('\n');

const stringifyOracleStats = (oracleStats: OracleStats) => [
  chalk`{yellow ${String(oracleStats.count).padStart(6)}} total oracle calls`,
  chalk`| {yellow ${prettyBytes(oracleStats.bytesUp).padStart(9)}} sent`,
  chalk`| {yellow ${prettyBytes(oracleStats.bytesDown).padStart(9)}} received`,
].join(' ');

interface LogProgressOptions {
  recovered: Buffer;
  blockSize: number;
  suffixLength: number;
  byte: number;
  oracleStats: OracleStats;
}
export function logProgress({ recovered, blockSize, suffixLength, byte, oracleStats }: LogProgressOptions) {
  const totalSize = Math.max(suffixLength, recovered.length);
  const plainHex = recovered.toString('hex');
  const colorized = colorizeHex({ plainHex, totalSize, foundSize: recovered.length });
  const printable = getPrintable(recovered.toString('latin1'));

  const percent = totalSize ? recovered.length / totalSize : 1;
  const mapFunc = (hexRow: string, i: number) => {
    const plain = printable.slice(i * blockSize, (i + 1) * blockSize);
    return `${String(i + 1).padStart(2)}. ${hexRow} ${plain}`;
  };
  const rows = wrapAndSplit(colorized, blockSize * 2)
    .map(mapFunc)
    .join('\n');
  const { barComplete, barIncomplete } = getBar(percent, blockSize * 2 + 4);
  log(
    rows,
    '\n' + barComplete + barIncomplete,
    (percent * 100).toFixed(1).padStart(5) + '%',
    `${recovered.length}/${totalSize}`.padStart(9),
    `0x${byte.toString(16).padStart(2, '0')}`,
    '\n\n' + stringifyOracleStats(oracleStats)
  );
}
export function logWarning(txt: string) {
  logUpdate.done();
  console.error(chalk`
{yellow.underline Warning}: ${txt}
`);
}

const logHeader = (h: string) => console.log(chalk.blue(`---${h}---`));

interface LogStart {
  ciphertext: Buffer;
  attackerInput: Buffer;
}
interface LogCompletion {
  recovered: Buffer;
  steps: string[];
  oracleStats: OracleStats;
}
export const attack = {
  logStart({ ciphertext, attackerInput }: LogStart) {
    console.log(chalk.bold.white('~~~BYTE-AT-A-TIME ECB ATTACK~~~'));
    console.log('ciphertext bytes:', chalk.yellow(String(ciphertext.length)), '|', 'attacker input bytes:', chalk.yellow(String(attackerInput.length)));
    console.log();
    logHeader('ciphertext of attacker input + secret in hex');
    console.log(ciphertext.toString('hex'));
    console.log();
  },
  logPhase(step: string) {
    console.log(chalk`{gray *} ${step}`);
  },
  logCompletion({ recovered, steps, oracleStats }: LogCompletion) {
    logUpdate.done();
    console.log();
    logHeader('steps');
    console.log(steps.join('\n'));
    console.log();
    logHeader('recovered printable bytes');
    console.log(getPrintable(recovered.toString('latin1')));
    console.log();
    logHeader('recovered bytes in hex');
    console.log(recovered.toString('hex'));
    console.log();
    logHeader('oracle stats');
    console.log(stringifyOracleStats(oracleStats));
    console.log();
  },
};
export const encryption = {
  logCompletion({ plaintext, ciphertext, blockSize }: { plaintext: Buffer; ciphertext: Buffer; blockSize: number }) {
    console.log(chalk.bold.white('~~~ENCRYPTING~~~'));
    console.log('plaintext bytes:', chalk.yellow(String(plaintext.length)), '|', 'blocks:', chalk.yellow(String(ciphertext.length / blockSize)));
    console.log();
    logHeader('ciphertext bytes in hex');
    console.log(wrapAndSplit(ciphertext.toString('hex'), blockSize * 2).join('\n'));
    console.log();
  },
};

interface AnalysisLogCompletion {
  probesTable: string[][];
  lengthFreq: { [key: string]: number };
  blockSizeGuess?: number;
  maxDuplicateBlocks: number;
  tmpDirPath?: string;
  oracleStats: OracleStats;
}
export const analysis = {
  logStart({ maxProbe, tmpDirPath }: { maxProbe: number; tmpDirPath?: string }) {
    console.log(chalk.bold.white('~~~ORACLE ANALYSIS~~~'));
    console.log('will make', chalk.yellow(String(maxProbe + 1)), 'oracle calls with growing filler prefixes and analyze ciphertexts');
    if (tmpDirPath) console.log('ciphertexts will be saved to', chalk.underline(tmpDirPath));
    console.log();
  },
  logCompletion({ probesTable, lengthFreq, blockSizeGuess, maxDuplicateBlocks, tmpDirPath, oracleStats }: AnalysisLogCompletion) {
    const tableConfig: TableUserConfig = {
      border: getBorderCharacters('void'),
      columnDefault: { paddingLeft: 0, paddingRight: 2 },
      singleLine: true,
    };
    const secondTableConfig: TableUserConfig = {
      border: getBorderCharacters('honeywell'),
      columnDefault: { alignment: 'right', paddingLeft: 2, paddingRight: 2 },
      singleLine: true,
    };
    const headerRows = ['Prefix Length', 'Ciphertext Length', 'Duplicate Blocks'].map((x) => chalk.gray(x));
    logHeader('probes');
    console.log(table([headerRows, ...probesTable], tableConfig));
    logHeader('ciphertext length frequencies');
    console.log(
      table(
        Object.entries(lengthFreq).map(([k, v]) => [k, v + ' time(s)']),
        secondTableConfig
      )
    );
    logHeader('oracle stats');
    console.log(stringifyOracleStats(oracleStats), '\n');
    if (tmpDirPath) {
      logHeader('all ciphertexts saved to');
      console.log(tmpDirPath + '\n');
    }
    logHeader('automated analysis');
    if (!blockSizeGuess) {
      console.log(chalk`Ciphertext length never changed. The oracle may ignore the prefix, or the block size is larger than the probe range.`);
    } else {
      console.log(chalk`Ciphertext length grows in steps of {yellow ${String(blockSizeGuess)}} bytes, which is likely the block size.`);
      if (maxDuplicateBlocks > 0) {
        console.log(chalk`Repeated ciphertext blocks were found for repeated filler. The oracle is {bold likely using ECB mode}.`);
      } else {
        console.log(chalk`No repeated ciphertext blocks were found. The oracle is {bold unlikely to use ECB mode}.`);
      }
    }
    console.log();
  },
};

export function logError(err: Error) {
  logUpdate.done();
  console.error(chalk.red(err.stack || err.message));
}
