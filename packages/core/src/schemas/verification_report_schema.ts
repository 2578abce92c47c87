// Unknown keys are tolerated: services add their own metadata around the report
export const VerificationReportSchema = {
  $id: 'omc-bridge/verification-report',
  type: 'object',
  properties: {
    summary: {
      type: 'object',
      additionalProperties: { type: 'string' }
    },
    issues: {
      type: 'array',
      items: {
        type: 'object',
        required: ['message'],
        properties: {
          rule: { type: 'string' },
          status: { type: 'string' },
          message: { type: 'string' }
        }
      }
    }
  }
} as const;
