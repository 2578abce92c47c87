export const ConverterConfigSchema = {
  $id: 'omc-bridge/converter-config',
  type: 'object',
  additionalProperties: false,
  properties: {
    identifierScope: { type: 'string', minLength: 1 },
    originalRecordPolicy: { type: 'string', enum: ['verbatim', 'encoded'] },
    progressInterval: { type: 'integer', minimum: 1 },
    logLevel: { type: 'string', enum: ['debug', 'info', 'warn', 'error', 'silent'] },
    verification: {
      type: 'object',
      additionalProperties: false,
      required: ['endpoint'],
      properties: {
        endpoint: { type: 'string', format: 'uri' },
        timeoutMs: { type: 'integer', minimum: 1 },
        fieldName: { type: 'string', minLength: 1 }
      }
    }
  }
} as const;
