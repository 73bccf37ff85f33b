import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  renderLifecycleScripts,
  renderOnCreateScript,
  renderOnStartScript,
  renderSetupScript,
} from './lifecycleScripts.js'
import { buildBootstrapPlan } from '../services/bootstrap/plan.js'
import { resolveBootstrapPaths } from '../services/bootstrap/paths.js'
import { NOT_READY_MESSAGE } from '../services/bootstrap/activator.js'
import { SpawnCommandRunner } from '../services/bootstrap/commandRunner.js'
import { parseStatusRecord } from '../services/bootstrap/statusStore.js'
import type { BootstrapPaths, BootstrapPlan } from '../services/bootstrap/types.js'
import { tensorflowGpu } from './definitions/tensorflow-gpu.js'

const paths = resolveBootstrapPaths()
const plan = buildBootstrapPlan(tensorflowGpu, paths)

describe('renderOnCreateScript', () => {
  const script = renderOnCreateScript(plan, paths)
  const lines = script.split('\n')

  it('writes the setup script and starts it detached as the notebook user', () => {
    expect(lines.slice(0, 2)).toEqual(['#!/bin/bash', 'set -e'])
    expect(lines).toContain("cat << 'SETUP_EOF' > /home/ec2-user/SageMaker/setup-environment.sh")
    expect(lines).toContain('chmod +x /home/ec2-user/SageMaker/setup-environment.sh')
    expect(lines).toContain(
      'sudo -u ec2-user -i nohup /home/ec2-user/SageMaker/setup-environment.sh >> /home/ec2-user/SageMaker/setup.log 2>&1 &'
    )
  })

  it('embeds the setup script verbatim', () => {
    expect(script).toContain(`${renderSetupScript(plan, paths)}\nSETUP_EOF\n`)
  })

  it('runs the setup as a different user when asked', () => {
    expect(renderOnCreateScript(plan, paths, { user: 'jovyan' })).toContain('sudo -u jovyan -i nohup')
  })
})

describe('renderSetupScript', () => {
  const script = renderSetupScript(plan, paths)
  const lines = script.split('\n')

  it('points the status helpers at the configured files', () => {
    expect(lines).toContain('STATUS_FILE=/home/ec2-user/SageMaker/setup-status.json')
    expect(lines).toContain('MARKER_FILE=/home/ec2-user/SageMaker/setup-complete')
    expect(lines).toContain('export PATH=/home/ec2-user/SageMaker/custom-miniconda/miniconda/bin:"$PATH"')
    expect(lines).toContain(`trap 'write_status FAILED "Step $CURRENT_STEP exited with code $?"' ERR`)
  })

  it('records progress before every step, in plan order', () => {
    const positions = plan.steps.map(step => lines.indexOf(`CURRENT_STEP=${step.id}`))

    expect(positions.every(p => p > 0)).toBe(true)
    expect([...positions].sort((a, b) => a - b)).toEqual(positions)
    for (const position of positions) {
      expect(lines[position + 1]).toBe('write_status IN_PROGRESS')
    }
  })

  it('renders each step as a quoted command line', () => {
    const index = lines.indexOf('CURRENT_STEP=install-pytorch')
    expect(lines[index - 1]).toBe('# Install PyTorch with CUDA support')
    expect(lines[index + 2]).toBe(
      '/home/ec2-user/SageMaker/custom-miniconda/miniconda/envs/tensorflow2_p39/bin/pip install torch==2.1.0 torchvision==0.16.0 torchaudio==2.1.0 --index-url https://download.pytorch.org/whl/cu118'
    )
  })

  it('clears the marker at the start and writes it only after COMPLETED', () => {
    expect(lines.indexOf('rm -f "$MARKER_FILE"')).toBeLessThan(lines.indexOf('CURRENT_STEP=prepare'))
    expect(lines.slice(-3)).toEqual(['CURRENT_STEP=""', 'write_status COMPLETED', 'touch "$MARKER_FILE"'])
  })

  it('quotes paths that contain spaces', () => {
    const spaced = resolveBootstrapPaths({ homeDir: '/data/my notebooks' })
    const text = renderSetupScript(buildBootstrapPlan(tensorflowGpu, spaced), spaced)

    expect(text).toContain("STATUS_FILE='/data/my notebooks/setup-status.json'")
    expect(text).toContain("mkdir -p '/data/my notebooks/custom-miniconda'")
  })
})

describe('renderOnStartScript', () => {
  it('exits quietly while setup is unfinished', () => {
    const script = renderOnStartScript(paths)

    expect(script).toContain(`if ! grep -q '"state":"COMPLETED"' "$STATUS_FILE"; then`)
    expect(script).toContain(`        echo "${NOT_READY_MESSAGE}"\n        exit 0`)
    expect(script).toContain('elif ! [ -f "$MARKER_FILE" ]; then')
  })

  it('registers every environment with a Custom display name', () => {
    const script = renderOnStartScript(paths)

    expect(script).toContain('for env in /home/ec2-user/SageMaker/custom-miniconda/miniconda/envs/*; do')
    expect(script).toContain(
      '"$env/bin/python" -m ipykernel install --user --name "$BASENAME" --display-name "Custom ($BASENAME)"'
    )
  })

  it('probes the init system at start time by default', () => {
    const script = renderOnStartScript(paths)

    expect(script).toContain(
      [
        'if [ -d /run/systemd/system ]; then',
        '    sudo systemctl --no-block restart jupyter-server.service',
        'else',
        '    sudo initctl restart jupyter-server --no-wait',
        'fi',
      ].join('\n')
    )
  })

  it('emits a single restart command when the init system is forced', () => {
    const script = renderOnStartScript(paths, { initSystem: 'upstart' })

    expect(script.trimEnd().split('\n').slice(-1)).toEqual(['sudo initctl restart jupyter-server --no-wait'])
    expect(script).not.toContain('systemctl')
  })
})

describe('rendered scripts under bash', () => {
  const runner = new SpawnCommandRunner(10000)
  let dir: string
  let local: BootstrapPaths

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'lifecycle-'))
    local = resolveBootstrapPaths({ homeDir: dir })
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  async function runScript(name: string, content: string) {
    const file = join(dir, name)
    await writeFile(file, content)
    return runner.run({ argv: ['bash', file], cwd: dir })
  }

  function localPlan(steps: BootstrapPlan['steps']): BootstrapPlan {
    return { profileId: 'local', environmentName: 'py39', pathPrefix: [dir], steps }
  }

  it('records the failing step as FAILED and stops there', async () => {
    const failing = localPlan([
      { id: 'first', description: 'Succeeds', argv: ['true'] },
      { id: 'boom', description: 'Fails', argv: ['false'] },
      { id: 'never', description: 'Never runs', argv: ['touch', join(dir, 'never')] },
    ])

    const result = await runScript('setup.sh', renderSetupScript(failing, local))

    expect(result.exitCode).toBe(1)
    const record = parseStatusRecord(JSON.parse(await readFile(local.statusFile, 'utf-8')))
    expect(record).toMatchObject({ state: 'FAILED', step: 'boom', error: 'Step boom exited with code 1' })
    expect(record.pid).toBeUndefined()
    await expect(stat(join(dir, 'never'))).rejects.toThrow()
    await expect(stat(local.markerFile)).rejects.toThrow()
  })

  it('records COMPLETED and touches the marker when every step succeeds', async () => {
    const passing = localPlan([
      { id: 'first', description: 'Succeeds', argv: ['true'] },
      { id: 'second', description: 'Also succeeds', argv: ['touch', join(dir, 'second')] },
    ])

    const result = await runScript('setup.sh', renderSetupScript(passing, local))

    expect(result.exitCode).toBe(0)
    const record = parseStatusRecord(JSON.parse(await readFile(local.statusFile, 'utf-8')))
    expect(record.state).toBe('COMPLETED')
    expect(record.completedAt).toBe(record.updatedAt)
    expect(record.step).toBeUndefined()
    expect((await stat(local.markerFile)).isFile()).toBe(true)
  })

  it('exits 0 with the not-ready message while setup is in progress', async () => {
    await writeFile(
      local.statusFile,
      '{"state":"IN_PROGRESS","updatedAt":"2024-05-01T12:00:00Z","step":"install-cuda","pid":4242}\n'
    )

    const result = await runScript('on-start.sh', renderOnStartScript(local, { initSystem: 'systemd' }))

    expect(result.exitCode).toBe(0)
    expect(result.stdout).toBe(`${NOT_READY_MESSAGE}\n`)
  })

  it('exits 0 with the not-ready message when nothing has run yet', async () => {
    const result = await runScript('on-start.sh', renderOnStartScript(local, { initSystem: 'systemd' }))

    expect(result.exitCode).toBe(0)
    expect(result.stdout).toBe(`${NOT_READY_MESSAGE}\n`)
  })
})

describe('renderLifecycleScripts', () => {
  it('renders both hooks for the default profile', () => {
    const scripts = renderLifecycleScripts()

    expect(scripts.onCreate).toContain('python=3.9')
    expect(scripts.onStart).toContain('Restarting the Jupyter server..')
  })
})
