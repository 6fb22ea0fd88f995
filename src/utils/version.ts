import fs from 'fs'
import path from 'path'

const FALLBACK_VERSION = '0.0.0'

/**
 * 讀取 package.json 中的版本號
 * src/utils 與 dist/utils 都位於專案根目錄下兩層
 */
export function getPackageVersion(): string {
  const candidates = [path.join(__dirname, '../../package.json'), path.join(process.cwd(), 'package.json')]

  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) {
      continue
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'))
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version
    }
  }

  return FALLBACK_VERSION
}
