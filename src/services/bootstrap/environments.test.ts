import { describe, it, expect, afterEach } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { listEnvironments } from './environments.js'

describe('listEnvironments', () => {
  let root: string | undefined

  afterEach(async () => {
    if (root) await rm(root, { recursive: true, force: true })
    root = undefined
  })

  it('returns an empty list when the envs root does not exist', async () => {
    expect(await listEnvironments('/nonexistent/miniconda/envs')).toEqual([])
  })

  it('lists directories sorted by name', async () => {
    root = await mkdtemp(join(tmpdir(), 'envs-'))
    await mkdir(join(root, 'pytorch_p310'))
    await mkdir(join(root, 'tensorflow2_p39'))
    await mkdir(join(root, 'base_env'))
    await writeFile(join(root, '.conda_envs_dir_test'), '')

    expect(await listEnvironments(root)).toEqual(['base_env', 'pytorch_p310', 'tensorflow2_p39'])
  })

  it('skips hidden directories', async () => {
    root = await mkdtemp(join(tmpdir(), 'envs-'))
    await mkdir(join(root, '.trash'))
    await mkdir(join(root, 'tensorflow2_p39'))

    expect(await listEnvironments(root)).toEqual(['tensorflow2_p39'])
  })
})
