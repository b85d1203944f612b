#!/usr/bin/env node
import { config as loadEnv } from 'dotenv'
import { defaultIO } from './interfaces/cli/io.js'
import { runCli } from './interfaces/cli/run.js'

// FILEKEEPER_* settings may come from a .env in the working directory
loadEnv({ quiet: true })

process.exitCode = await runCli({
  argv: process.argv.slice(2),
  defaultWorkspace: process.cwd(),
  io: defaultIO(),
  env: process.env
})
