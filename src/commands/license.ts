import * as fs from 'fs/promises'
import type { CommandModule } from 'yargs'
import { UNKNOWN_LICENSE } from '../constants.js'
import { LicenseLookupError } from '../errors.js'
import { PomLicenseResolver } from '../license/pom-resolver.js'
import type { LicenseResolver } from '../license/types.js'
import { debug, log } from '../utils.js'
import { getAuditConfigFromEnv } from '../utils/config.js'

interface LicenseArgs {
  'jar-url': string
  output?: string
  debug: boolean
}

/**
 * License of a single artifact, or UNKNOWN when the URL is empty, the
 * lookup fails or the POM declares no license.
 */
export async function collectLicense(
  jarUrl: string,
  resolver: LicenseResolver,
  verbose: boolean = false,
): Promise<string> {
  if (!jarUrl) {
    debug(`Empty artifact URL, using ${UNKNOWN_LICENSE}`)
    return UNKNOWN_LICENSE
  }

  let license: string
  try {
    license = await resolver.resolve(jarUrl)
  } catch (err) {
    if (!(err instanceof LicenseLookupError)) {
      throw err
    }
    log(`Using ${UNKNOWN_LICENSE} for ${jarUrl}: ${err.message}`, verbose)
    return UNKNOWN_LICENSE
  }

  if (!license) {
    log(`No license declared for ${jarUrl}, using ${UNKNOWN_LICENSE}`, verbose)
    return UNKNOWN_LICENSE
  }
  return license
}

export const licenseCommand: CommandModule<{}, LicenseArgs> = {
  command: 'license <jar-url>',
  describe: 'Look up the license declared in the POM beside a jar',
  builder: yargs => {
    return yargs
      .positional('jar-url', {
        describe: 'Location of the jar (https, http or file URL)',
        type: 'string',
        demandOption: true,
      })
      .option('output', {
        describe: 'File to write the license to (default: stdout)',
        type: 'string',
      })
      .option('debug', {
        describe: 'Explain why a license is UNKNOWN',
        type: 'boolean',
        default: false,
      })
      .example(
        '$0 license https://repo.example.com/g/a/1.0/a-1.0.jar',
        'Print the license of a-1.0.jar',
      )
  },
  handler: async argv => {
    try {
      const config = getAuditConfigFromEnv()
      const resolver = new PomLicenseResolver({
        retryDelayMs: config.retryDelayMs,
      })
      const license = await collectLicense(
        argv['jar-url'],
        resolver,
        argv.debug || config.debug,
      )

      if (argv.output) {
        await fs.writeFile(argv.output, `${license}\n`, 'utf-8')
      } else {
        console.log(license)
      }
      process.exit(0)
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err)
      console.error(`Error: ${errorMessage}`)
      process.exit(1)
    }
  },
}
