import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from '../infrastructure/config.js';
import { logger } from '../infrastructure/logger.js';

function main(): void {
  const configResult = loadConfig();
  if (!configResult.ok) {
    logger.fatal({ errorCode: configResult.error.code, details: configResult.error.details }, configResult.error.message);
    process.exit(1);
  }

  const config = configResult.value;
  if (!config.groqApiKey) {
    logger.warn('GROQ_API_KEY is not set; POST /extract-and-validate will fail');
  }

  const app = createApp({
    knownCurrencies: config.knownCurrencies,
    maxPdfSizeBytes: config.maxPdfSizeBytes,
  });

  app.listen(config.port, () => {
    logger.info({ port: config.port }, 'Invoice QC API started');
  });
}

main();
