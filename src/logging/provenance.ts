import fs from 'fs'
import path from 'path'

export type ProvenanceEventType = 'qa.check' | 'qa.summary'

export type ProvenanceEvent = {
  runId?: string
  name?: string
  type: ProvenanceEventType
  payload: Record<string, unknown>
  timestamp?: string
}

/**
 * Append a JSONL provenance event to a file. Creates the file if needed.
 * Synchronous so events land in the same order as the log sections they describe.
 */
export function appendProvenanceEvent(filePath: string, event: ProvenanceEvent): void {
  const e = { ...event, timestamp: event.timestamp || new Date().toISOString() }
  fs.appendFileSync(filePath, JSON.stringify(e) + '\n', { encoding: 'utf8' })
}

/**
 * Create the provenance file (and its directory) up front so an unusable path fails
 * before any check runs.
 */
export function ensureProvenanceFile(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true })
  fs.appendFileSync(filePath, '', { encoding: 'utf8' })
}

export function newRunId(now: Date = new Date()): string {
  return now.getTime().toString(36) + '-' + Math.random().toString(36).slice(2, 8)
}
