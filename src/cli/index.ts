#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'node:util';
import { loadConfig } from '../infrastructure/config.js';
import { logger } from '../infrastructure/logger.js';
import { EXIT_FAILURE, extractCommand, fullRunCommand, validateCommand, type CommandContext } from './commands.js';

const USAGE = `Usage: invoice-qc <command> [options]

Commands:
  extract   --pdf-dir <dir> --output <file>                 Extract invoice data from PDFs to JSON
  validate  --input <file> --report <file>                  Validate invoice JSON and write a report
  full-run  --pdf-dir <dir> --report <file> [--save-extracted]  Extract and validate in one go

Examples:
  invoice-qc extract --pdf-dir pdfs --output invoices.json
  invoice-qc validate --input invoices.json --report report.json
  invoice-qc full-run --pdf-dir pdfs --report report.json --save-extracted`;

function usage(message?: string): number {
  if (message) console.error(message);
  console.error(USAGE);
  return EXIT_FAILURE;
}

function required(values: Record<string, string | boolean | undefined>, ...names: string[]): string[] | null {
  const found: string[] = [];
  for (const name of names) {
    const value = values[name];
    if (typeof value !== 'string' || value === '') return null;
    found.push(value);
  }
  return found;
}

async function run(argv: string[]): Promise<number> {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        'pdf-dir': { type: 'string' },
        output: { type: 'string' },
        input: { type: 'string' },
        report: { type: 'string' },
        'save-extracted': { type: 'boolean', default: false },
      },
    });
  } catch (cause) {
    return usage(cause instanceof Error ? cause.message : String(cause));
  }

  const [command] = parsed.positionals;
  const { values } = parsed;

  const configResult = loadConfig();
  if (!configResult.ok) {
    console.error(`Error: ${configResult.error.message} (${configResult.error.details ?? ''})`);
    return EXIT_FAILURE;
  }

  const ctx: CommandContext = {
    knownCurrencies: configResult.value.knownCurrencies,
    maxPdfSizeBytes: configResult.value.maxPdfSizeBytes,
  };

  switch (command) {
    case 'extract': {
      const args = required(values, 'pdf-dir', 'output');
      if (!args) return usage('extract needs --pdf-dir and --output');
      const [pdfDir, output] = args;
      return extractCommand({ pdfDir, output }, ctx);
    }

    case 'validate': {
      const args = required(values, 'input', 'report');
      if (!args) return usage('validate needs --input and --report');
      const [input, report] = args;
      return validateCommand({ input, report }, ctx);
    }

    case 'full-run': {
      const args = required(values, 'pdf-dir', 'report');
      if (!args) return usage('full-run needs --pdf-dir and --report');
      const [pdfDir, report] = args;
      return fullRunCommand({ pdfDir, report, saveExtracted: values['save-extracted'] === true }, ctx);
    }

    default:
      return usage(command ? `Unknown command: ${command}` : undefined);
  }
}

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error instanceof Error ? error.message : String(error) }, 'Unhandled error');
    process.exitCode = EXIT_FAILURE;
  });
