import * as fs from 'fs/promises'
import type { CommandModule } from 'yargs'
import { readBom } from '../bom/document.js'

interface ListArgs {
  'bom-file': string
  json: boolean
}

export async function listBomEntries(
  bomPath: string,
  outputJson: boolean,
): Promise<void> {
  const document = await readBom(bomPath)
  const entries = Object.entries(document)

  if (entries.length === 0) {
    if (outputJson) {
      console.log(JSON.stringify({ packages: [] }, null, 2))
    } else {
      console.log('No packages found in BOM.')
    }
    return
  }

  if (outputJson) {
    const jsonOutput = {
      packages: entries.map(([key, entry]) => ({
        key,
        name: entry.name,
        version: entry.version,
        license: entry.license,
        jarUrl: entry.jar_url,
        sourceUrl: entry.url,
        ...(entry.reason === undefined ? {} : { reason: entry.reason }),
      })),
    }
    console.log(JSON.stringify(jsonOutput, null, 2))
    return
  }

  console.log(`Found ${entries.length} package(s):\n`)
  for (const [key, entry] of entries) {
    console.log(`Package: ${key}`)
    if (entry.reason) {
      console.log(`  Issue: ${entry.reason}`)
    }
    const licenseLines = entry.license ? entry.license.split('\n') : ['(unknown)']
    console.log(`  License: ${licenseLines.join(', ')}`)
    console.log(`  Artifact: ${entry.jar_url}`)
    if (entry.url) {
      console.log(`  Sources: ${entry.url}`)
    }
    if (entry.resolution) {
      console.log(`  Resolution: ${entry.resolution}`)
    }
    console.log('')
  }
}

export const listCommand: CommandModule<{}, ListArgs> = {
  command: 'list <bom-file>',
  describe: 'List the packages of a BOM or BOM-issues file',
  builder: yargs => {
    return yargs
      .positional('bom-file', {
        describe: 'Path to a .bom.yaml or .bom-issues.yaml file',
        type: 'string',
        demandOption: true,
      })
      .option('json', {
        describe: 'Output as JSON',
        type: 'boolean',
        default: false,
      })
  },
  handler: async argv => {
    try {
      const bomPath = argv['bom-file']

      try {
        await fs.access(bomPath)
      } catch {
        if (argv.json) {
          console.log(JSON.stringify({ error: 'BOM not found', path: bomPath }, null, 2))
        } else {
          console.error(`BOM not found at ${bomPath}`)
        }
        process.exit(1)
      }

      await listBomEntries(bomPath, argv.json)
      process.exit(0)
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err)
      if (argv.json) {
        console.log(JSON.stringify({ error: errorMessage }, null, 2))
      } else {
        console.error(`Error: ${errorMessage}`)
      }
      process.exit(1)
    }
  },
}
