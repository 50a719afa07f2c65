import fs from 'fs'
import os from 'os'
import path from 'path'
import { describe, expect, test } from 'vitest'
import { appendProvenanceEvent, ensureProvenanceFile, newRunId } from './provenance'

describe('provenance log', () => {
  test('appends one JSON object per line and stamps a timestamp', async () => {
    const tmp = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'qa-prov-'))
    const file = path.join(tmp, 'prov.jsonl')

    appendProvenanceEvent(file, { runId: 'r1', name: 'lint', type: 'qa.check', payload: { exitCode: 0 } })
    appendProvenanceEvent(file, {
      runId: 'r1',
      type: 'qa.summary',
      payload: { failed: false },
      timestamp: '2026-01-02T03:04:05.000Z'
    })

    const lines = (await fs.promises.readFile(file, 'utf8')).trim().split('\n')
    expect(lines).toHaveLength(2)
    const first = JSON.parse(lines[0])
    expect(first.name).toBe('lint')
    expect(first.payload).toEqual({ exitCode: 0 })
    expect(typeof first.timestamp).toBe('string')
    expect(JSON.parse(lines[1]).timestamp).toBe('2026-01-02T03:04:05.000Z')
  })

  test('creates missing directories and an empty file up front', async () => {
    const tmp = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'qa-prov-'))
    const file = path.join(tmp, 'a', 'b', 'prov.jsonl')

    ensureProvenanceFile(file)

    expect(await fs.promises.readFile(file, 'utf8')).toBe('')
  })

  test('run ids start with the base-36 time', () => {
    const now = new Date(1700000000000)
    expect(newRunId(now).startsWith(now.getTime().toString(36) + '-')).toBe(true)
  })
})
