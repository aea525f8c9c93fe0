import { basename, dirname, resolve } from 'node:path'
import { NoSuchPathError, NotARepositoryError } from '../types/errors.js'
import { statIfExists } from '../utils/fs.js'
import { hasGitMetadata } from '../utils/gitdir.js'

export interface RepoRoot {
  /** Absolute path of the work tree root. */
  root: string
  /** Display name used for the chart section and task ids. */
  name: string
}

export async function locateRepository(path: string): Promise<RepoRoot> {
  const target = resolve(path)
  const stats = await statIfExists(target)
  if (!stats) {
    throw new NoSuchPathError(path)
  }

  let current = stats.isDirectory() ? target : dirname(target)
  for (;;) {
    if (await hasGitMetadata(current)) {
      return { root: current, name: basename(current) }
    }
    const parent = dirname(current)
    if (parent === current) {
      throw new NotARepositoryError(path)
    }
    current = parent
  }
}
