import { describe, it, before, after, beforeEach, afterEach, mock } from 'node:test'
import assert from 'node:assert/strict'
import * as path from 'path'
import { listBomEntries } from './list.js'
import { createIssuesDocument, writeBom } from '../bom/document.js'
import { parseCoordinate } from '../coordinate/coordinate.js'
import { createTestDir, removeTestDir } from '../test-utils.js'
import type { PackageRecord } from '../types.js'

const RECORD: PackageRecord = {
  coordinate: 'org.example:a:1.0',
  ...parseCoordinate('org.example:a:1.0'),
  jarUrl: 'https://repo.example.com/a-1.0.jar',
  sourceUrl: 'https://repo.example.com/a-1.0-sources.jar',
  license: 'Apache-2.0\nMIT',
  modified: false,
}

describe('list command', () => {
  let testDir: string
  let bomPath: string
  let output: string[] = []

  before(async () => {
    testDir = await createTestDir('list-command-')
    bomPath = path.join(testDir, 'app.bom-issues.yaml')
    await writeBom(bomPath, createIssuesDocument([{ record: RECORD, reason: 'Denied' }]))
  })

  after(async () => {
    await removeTestDir(testDir)
  })

  beforeEach(() => {
    output = []
    mock.method(console, 'log', (...args: unknown[]) => {
      output.push(String(args[0]))
    })
  })

  afterEach(() => {
    mock.restoreAll()
  })

  it('should print entries as JSON', async () => {
    await listBomEntries(bomPath, true)
    assert.deepEqual(JSON.parse(output.join('\n')), {
      packages: [
        {
          key: 'org.example:a:1.0',
          name: 'org.example:a',
          version: '1.0',
          license: 'Apache-2.0\nMIT',
          jarUrl: 'https://repo.example.com/a-1.0.jar',
          sourceUrl: 'https://repo.example.com/a-1.0-sources.jar',
          reason: 'Denied',
        },
      ],
    })
  })

  it('should print entries for people', async () => {
    await listBomEntries(bomPath, false)
    assert.deepEqual(output, [
      'Found 1 package(s):\n',
      'Package: org.example:a:1.0',
      '  Issue: Denied',
      '  License: Apache-2.0, MIT',
      '  Artifact: https://repo.example.com/a-1.0.jar',
      '  Sources: https://repo.example.com/a-1.0-sources.jar',
      '',
    ])
  })

  it('should report an empty BOM', async () => {
    const emptyPath = path.join(testDir, 'empty.bom.yaml')
    await writeBom(emptyPath, {})
    await listBomEntries(emptyPath, false)
    assert.deepEqual(output, ['No packages found in BOM.'])
  })
})
