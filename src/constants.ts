import fs from 'fs'
import path from 'path'

interface PackageInfo {
  name: string
  version: string
}

function readPackageInfo(): PackageInfo {
  const { name, version }: Partial<PackageInfo> = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'))
  return { name: name || 'ecb-oracle-attacker', version: version || '0.0.0' }
}

const pkg = readPackageInfo()

export const PKG_NAME = pkg.name
export const PKG_VERSION = pkg.version

export const AES_BLOCK_SIZE = 16
export const AES_ALGORITHM = 'aes-128-ecb'
export const MAX_BLOCK_SIZE_PROBE = 64
export const FILLER_BYTE = 0x41
