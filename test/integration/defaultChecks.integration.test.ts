import fs from 'fs'
import os from 'os'
import path from 'path'
import { describe, expect, it } from 'vitest'
import { main } from '../../src/cli'

describe('Integration: default checks -> log + provenance', () => {
  it('runs pytest, ruff and ty in order and records each one', async () => {
    const tmp = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'qa-int-'))
    const bin = path.join(tmp, 'bin')
    await fs.promises.mkdir(bin)
    // pytest passes, ruff reports on stderr and fails, ty is not installed
    await fs.promises.writeFile(path.join(bin, 'pytest'), '#!/bin/sh\necho "5 passed"\n', { mode: 0o755 })
    await fs.promises.writeFile(path.join(bin, 'ruff'), '#!/bin/sh\necho "ruff $*" 1>&2\nexit 1\n', { mode: 0o755 })

    const out = path.join(tmp, 'qa_output.txt')
    const prov = path.join(tmp, 'prov.jsonl')
    const code = await main([out], { PATH: bin, QA_PROVENANCE_PATH: prov })

    expect(code).toBe(1)
    const log = await fs.promises.readFile(out, 'utf8')
    const body = log.slice(log.indexOf('==> '))
    expect(body).toBe(
      [
        '==> pytest',
        'Command: pytest',
        '5 passed',
        'Exit code: 0',
        '',
        '==> ruff',
        'Command: ruff check .',
        'ruff check .',
        'Exit code: 1',
        '',
        '==> ty',
        'Command: ty check .',
        "Result: missing command 'ty'",
        '',
        'One or more checks failed.',
        ''
      ].join('\n')
    )

    const events = (await fs.promises.readFile(prov, 'utf8'))
      .trim()
      .split('\n')
      .map((l) => JSON.parse(l))
    expect(events.map((e) => e.name ?? e.type)).toEqual(['pytest', 'ruff', 'ty', 'qa.summary'])
    expect(events[1].payload.exitCode).toBe(1)
  })
})
