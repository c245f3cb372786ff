import { startReader } from './app'
import { runCli } from './cli'

process.exitCode = await runCli(process.argv.slice(2), {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
  env: process.env,
  run: (env) => startReader({ env }),
})
