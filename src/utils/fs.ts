import type { Stats } from 'node:fs'
import { stat } from 'node:fs/promises'

export function isErrno(error: unknown, code: string): boolean {
  return !!error && typeof error === 'object' && 'code' in error && error.code === code
}

/** Like `stat`, but resolves to null when nothing exists at `path`. */
export async function statIfExists(path: string): Promise<Stats | null> {
  try {
    return await stat(path)
  } catch (error) {
    if (isErrno(error, 'ENOENT') || isErrno(error, 'ENOTDIR')) {
      return null
    }
    throw error
  }
}
