import { randomUUID } from 'node:crypto';
import { Router, type NextFunction, type Request, type Response } from 'express';
import { validateJsonInput, extractAndValidateInput, describeIssues } from '../../domain/schemas.js';
import { successResponse, errorResponse, sendAppError } from '../middleware/error-handler.js';
import * as validationService from '../../services/validation/index.js';
import * as ingestService from '../../services/ingest/index.js';
import { logger } from '../../infrastructure/logger.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { SERVICE_NAME, SERVICE_VERSION } from '../service.js';

export interface InvoiceRouterOptions {
  knownCurrencies: readonly string[];
  maxPdfSizeBytes?: number;
}

function noInvoicesExtracted(failures: readonly ingestService.IngestFailure[]): AppError {
  return createAppError(
    ErrorCode.EXTRACTION_FAILED,
    'No invoices could be extracted',
    failures.some((f) => f.error.retryable),
    failures.map((f) => `${f.filename}: ${f.error.message}`).join('; '),
  );
}

export function createInvoiceRouter(options: InvoiceRouterOptions): Router {
  const router = Router();
  const rules = validationService.createRuleRegistry({ knownCurrencies: options.knownCurrencies });

  router.get('/api/info', (_req: Request, res: Response) => {
    const grouped = validationService.groupRulesByCategory(rules);

    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      description: 'Extract and validate invoice data from PDFs',
      features: [
        'PDF text extraction',
        'LLM-based structured data extraction',
        'Business rule validation',
        'Duplicate detection',
        'Multi-file batch processing',
      ],
      supported_languages: ['German', 'English'],
      supported_currencies: [...options.knownCurrencies],
      validation_rules: Object.fromEntries(
        Object.entries(grouped).map(([category, descriptors]) => [category, descriptors.length]),
      ),
    });
  });

  router.get('/rules', (_req: Request, res: Response) => {
    res.json(successResponse({ rules: validationService.groupRulesByCategory(rules) }));
  });

  router.post('/validate-json', (req: Request, res: Response) => {
    const parsed = validateJsonInput.safeParse(req.body);
    if (!parsed.success) {
      res.status(422).json(errorResponse('VALIDATION_ERROR', 'Request body must be a JSON array of invoices', describeIssues(parsed.error)));
      return;
    }

    const report = validationService.validateInvoices(parsed.data, {
      rules,
      batchId: randomUUID(),
      source: 'api:validate-json',
    });

    // The report is the response body, unwrapped.
    res.json(report);
  });

  router.post('/extract-and-validate', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = extractAndValidateInput.safeParse(req.body);
    if (!parsed.success) {
      res.status(422).json(errorResponse('VALIDATION_ERROR', 'Invalid request body', describeIssues(parsed.error)));
      return;
    }

    const batchId = randomUUID();
    const { files } = parsed.data;

    logger.info({ batchId, fileCount: files.length }, 'Extract-and-validate request received');

    try {
      const ingestResult = await ingestService.ingestInvoicePdfs(files, {
        batchId,
        maxSizeBytes: options.maxPdfSizeBytes,
        continueOnError: true,
      });
      if (!ingestResult.ok) return sendAppError(res, ingestResult.error);

      const { invoices, failures } = ingestResult.value;
      if (invoices.length === 0) {
        return sendAppError(res, noInvoicesExtracted(failures));
      }

      const report = validationService.validateInvoices(invoices, {
        rules,
        batchId,
        source: 'api:extract-and-validate',
      });

      res.json({
        invoices,
        report,
        extraction_errors: failures.map(({ filename, error }) => ({ filename, code: error.code, message: error.message })),
      });
    } catch (error) {
      // Missing LLM credentials surface as a thrown Error from getLlm().
      next(error);
    }
  });

  return router;
}
