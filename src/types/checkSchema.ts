import type { JSONSchemaType } from 'ajv'

/**
 * A single quality gate: a display name and the argv that runs it.
 */
export type CheckSpec = {
  name: string
  command: string[]
}

/** Shape of the optional checks file named by QA_CHECKS_FILE. */
export type ChecksFile = {
  checks: CheckSpec[]
}

export const checksFileSchema: JSONSchemaType<ChecksFile> = {
  type: 'object',
  additionalProperties: false,
  required: ['checks'],
  properties: {
    checks: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['name', 'command'],
        properties: {
          name: { type: 'string', minLength: 1 },
          command: {
            type: 'array',
            minItems: 1,
            items: { type: 'string', minLength: 1 }
          }
        }
      }
    }
  }
}

export default checksFileSchema
