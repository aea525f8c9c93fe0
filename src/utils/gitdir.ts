import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { statIfExists } from './fs.js'

export function parseGitdir(content: string): string | null {
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim()
    if (!line) {
      continue
    }
    if (line.toLowerCase().startsWith('gitdir:')) {
      const target = line.slice('gitdir:'.length).trim()
      return target || null
    }
  }
  return null
}

/**
 * Whether `dir` is the top of a git work tree: it holds a `.git` directory,
 * or a `.git` file pointing elsewhere (linked worktrees, submodules).
 */
export async function hasGitMetadata(dir: string): Promise<boolean> {
  const dotGit = join(dir, '.git')
  const stats = await statIfExists(dotGit)
  if (!stats) {
    return false
  }
  if (stats.isDirectory()) {
    return true
  }
  if (stats.isFile()) {
    const content = await readFile(dotGit, 'utf8')
    return parseGitdir(content) !== null
  }
  return false
}
