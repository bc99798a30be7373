import pino from 'pino';

export const logger = pino({
  name: 'invoice-qc',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createBatchLogger(batchId: string, source?: string) {
  return logger.child({
    batchId,
    ...(source !== undefined && { source }),
  });
}
