export const errorResponseSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' },
    details: {},
  },
} as const;

export const SYSTEM_UNAVAILABLE = {
  error: 'SYSTEM_UNAVAILABLE',
  message: 'The system could not process this query',
} as const;
