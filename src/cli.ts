#!/usr/bin/env node

import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { auditCommand } from './commands/audit.js'
import { licenseCommand } from './commands/license.js'
import { listCommand } from './commands/list.js'

async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName('oss-audit')
    .usage('$0 <command> [options]')
    .command(auditCommand)
    .command(licenseCommand)
    .command(listCommand)
    .demandCommand(1, 'You must specify a command')
    .help()
    .alias('h', 'help')
    .version()
    .alias('v', 'version')
    .strict()
    .parse()
}

main().catch((error: Error) => {
  console.error('Error:', error.message)
  process.exit(1)
})
