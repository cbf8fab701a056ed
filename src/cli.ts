#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { cli } from 'cleye'
import { setCmd } from './commands/set'
import { getCmd } from './commands/get'
import { logCmd } from './commands/log'
import { shellCmd, startShell } from './commands/shell'
import { sharedFlags } from './commands/flags'
import type { PackageJson } from './types'

function readPackageJson(): PackageJson {
  const parsed: unknown = JSON.parse(
    readFileSync(join(__dirname, '..', 'package.json'), 'utf8')
  )
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'name' in parsed &&
    'version' in parsed &&
    'description' in parsed &&
    typeof parsed.name === 'string' &&
    typeof parsed.version === 'string' &&
    typeof parsed.description === 'string'
  ) {
    return {
      name: parsed.name,
      version: parsed.version,
      description: parsed.description
    }
  }
  throw new Error('Invalid package.json')
}

const packageJson = readPackageJson()

cli(
  {
    name: packageJson.name,
    version: packageJson.version,
    flags: {
      ...sharedFlags
    },
    commands: [setCmd, getCmd, shellCmd, logCmd],
    help: {
      description: packageJson.description
    }
  },
  (argv) => {
    // No sub-command: run the interactive shell
    startShell(argv.flags)
  }
)
