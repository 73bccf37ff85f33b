#!/usr/bin/env node
/**
 * notebook-provisioner CLI
 *
 * The lifecycle hooks and operators drive both bootstrap phases through this
 * entry point; it also prints the stack template and hook scripts.
 *
 *   notebook-provisioner template --name MyNotebook > stack.yml
 *   notebook-provisioner bootstrap --detach
 *   notebook-provisioner activate
 */

import 'dotenv/config'
import { realpathSync } from 'node:fs'
import { fileURLToPath, pathToFileURL } from 'node:url'
import { parseArgs } from 'node:util'
import { loadConfig } from './config/provisioner.js'
import type { ProvisionerConfig } from './config/provisioner.js'
import { createProvisionerServices, launchBootstrapWorker } from './services/bootstrap/index.js'
import type { ProvisionerServices } from './services/bootstrap/index.js'
import { ConfigError } from './services/bootstrap/errors.js'
import { getProfileById } from './templates/registry.js'
import { renderLifecycleScripts, renderNotebookStack, StackConfigError } from './templates/index.js'
import type { NotebookStackConfig } from './templates/index.js'
import { startProvisionerServer } from './server.js'
import { bootstrapLogger, setLogLevel, toError } from './utils/logger.js'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

export const USAGE = `Usage: notebook-provisioner <command> [options]

Commands:
  template    Print the CloudFormation stack
              --name <name> --repo <url> --instance-type <type>
              --volume <gb> --lifecycle-name <name>
  scripts     Print lifecycle scripts: on-create, on-start (default: both)
  bootstrap   Run the create phase [--force] [--detach]
  activate    Register environments as kernels and restart the notebook server
  status      Print the bootstrap status record
  serve       Start the GraphQL API and the stalled-bootstrap watchdog
`

export interface CliIO {
  stdout(text: string): void
  stderr(text: string): void
}

export interface CliDeps {
  env?: Record<string, string | undefined>
  io?: CliIO
  services?: ProvisionerServices
  launchWorker?: typeof launchBootstrapWorker
  startServer?: typeof startProvisionerServer
}

const processIO: CliIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
}

class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

const OPTIONS = {
  name: { type: 'string' },
  repo: { type: 'string' },
  'instance-type': { type: 'string' },
  volume: { type: 'string' },
  'lifecycle-name': { type: 'string' },
  force: { type: 'boolean' },
  detach: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const

function parseVolume(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined
  const value = Number(raw)
  if (!Number.isInteger(value)) {
    throw new UsageError(`--volume must be a whole number of GB, got "${raw}"`)
  }
  return value
}

function scriptsFor(config: ProvisionerConfig) {
  return renderLifecycleScripts({
    profile: getProfileById(config.profileId),
    paths: config.paths,
    initSystem: config.initSystem,
  })
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? processIO
  const [command, ...rest] = argv

  if (!command || command === 'help' || command === '--help' || command === '-h') {
    io.stdout(USAGE)
    return command ? EXIT_OK : EXIT_USAGE
  }

  try {
    const { values, positionals } = parseArgs({ args: rest, options: OPTIONS, allowPositionals: true })
    if (values.help) {
      io.stdout(USAGE)
      return EXIT_OK
    }
    const config = deps.services?.config ?? loadConfig(deps.env ?? process.env)
    setLogLevel(config.logLevel)
    const services = () => deps.services ?? createProvisionerServices(config)

    switch (command) {
      case 'template': {
        const overrides: Partial<NotebookStackConfig> = {
          notebookName: values.name,
          repoUrl: values.repo,
          instanceType: values['instance-type'],
          volumeSizeGb: parseVolume(values.volume),
          lifecycleConfigName: values['lifecycle-name'],
        }
        io.stdout(renderNotebookStack(overrides, scriptsFor(config)))
        return EXIT_OK
      }

      case 'scripts': {
        const which = positionals[0]
        const scripts = scriptsFor(config)
        if (which === 'on-create') {
          io.stdout(scripts.onCreate)
        } else if (which === 'on-start') {
          io.stdout(scripts.onStart)
        } else if (which === undefined) {
          io.stdout(`# on-create\n${scripts.onCreate}\n# on-start\n${scripts.onStart}`)
        } else {
          throw new UsageError(`Unknown script "${which}". Expected on-create or on-start`)
        }
        return EXIT_OK
      }

      case 'bootstrap': {
        const { store, bootstrapper } = services()
        if (values.detach) {
          await bootstrapper.assertIdle()
          const launch = deps.launchWorker ?? launchBootstrapWorker
          const worker = launch({
            cliPath: fileURLToPath(import.meta.url),
            logFile: config.paths.logFile,
            store,
            force: values.force,
          })
          const launched = await worker.spawned
          io.stdout(`${JSON.stringify({ launched, pid: worker.pid ?? null, logFile: config.paths.logFile })}\n`)
          return launched ? EXIT_OK : EXIT_FAILURE
        }
        const result = await bootstrapper.run({ force: values.force })
        io.stdout(`${JSON.stringify(result)}\n`)
        return EXIT_OK
      }

      case 'activate': {
        const result = await services().activator.run()
        io.stdout(`${JSON.stringify(result)}\n`)
        return EXIT_OK
      }

      case 'status': {
        const record = await services().store.read()
        io.stdout(`${JSON.stringify(record, null, 2)}\n`)
        return EXIT_OK
      }

      case 'serve': {
        const start = deps.startServer ?? startProvisionerServer
        start(services())
        return EXIT_OK
      }

      default:
        throw new UsageError(`Unknown command "${command}"`)
    }
  } catch (error) {
    const err = toError(error)
    if (err instanceof UsageError || err instanceof StackConfigError || isParseArgsError(err)) {
      io.stderr(`${err.message}\n\n${USAGE}`)
      return EXIT_USAGE
    }
    if (err instanceof ConfigError) {
      io.stderr(`Configuration error: ${err.message}\n`)
      return EXIT_FAILURE
    }
    bootstrapLogger.error(`Command ${command} failed`, { operation: command }, err)
    return EXIT_FAILURE
  }
}

function isParseArgsError(error: Error): boolean {
  return 'code' in error && typeof error.code === 'string' && error.code.startsWith('ERR_PARSE_ARGS_')
}

function isMainModule(): boolean {
  const entry = process.argv[1]
  if (!entry) return false
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href
  } catch {
    return false
  }
}

if (isMainModule()) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code
    })
    .catch(error => {
      console.error('Fatal:', error)
      process.exitCode = EXIT_FAILURE
    })
}
