#!/usr/bin/env node
import './env'
import { initSentry } from './lib/sentry'
initSentry()
import { loadSettings } from './config'
import { DubbingError, errorMessage } from './lib/errors'
import { getLogger } from './lib/logger'
import { runBatch } from './services/dubbing'
import { createPipelineDeps } from './runtime'
import { USAGE, parseCliArgs } from './utils/cliArgs'

const log = getLogger('cli')

async function main(argv: string[]): Promise<number> {
  const options = parseCliArgs(argv)
  if (options.help) {
    process.stdout.write(USAGE)
    return 0
  }
  const settings = loadSettings({ file: options.configFile, overrides: options.overrides })
  const results = await runBatch(options.tasks, { ...createPipelineDeps(settings), logger: log })

  for (const result of results) {
    const line =
      result.status === 'succeeded'
        ? `ok     ${result.file} -> ${Object.values(result.outputs).join(', ')}`
        : `failed ${result.file}: ${result.error?.code} ${result.error?.message}`
    process.stdout.write(`${line}\n`)
  }
  return results.every((r) => r.status === 'succeeded') ? 0 : 1
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    const code = err instanceof DubbingError ? err.code : 'INTERNAL'
    log.error({ err, code }, 'dub failed')
    process.stderr.write(`${errorMessage(err)}\n${err instanceof DubbingError && err.code === 'CONFIG' ? USAGE : ''}`)
    process.exitCode = 2
  })
