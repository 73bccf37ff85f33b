import { readdir } from 'fs/promises'

/**
 * Named environments are the non-hidden directories directly under the envs
 * root, sorted by name. A missing root means no environments yet.
 */
export async function listEnvironments(envsRoot: string): Promise<string[]> {
  try {
    const entries = await readdir(envsRoot, { withFileTypes: true })
    return entries
      .filter(entry => entry.isDirectory() && !entry.name.startsWith('.'))
      .map(entry => entry.name)
      .sort()
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return []
    }
    throw error
  }
}
