/**
 * Conversion entry points
 *
 * `convertCiiToUbl` is the engine: synchronous and pure apart from logging.
 * The XML and file variants read the source first; reader diagnostics come
 * before mapping diagnostics in the result.
 */

import { readFile } from 'fs/promises';
import type {
  CiiDocument,
  ConversionConfig,
  ConversionConfigInput,
  ConversionResult,
  Diagnostic,
} from '@invoice-bridge/contracts';
import { readCiiXml } from '@invoice-bridge/cii-reader';
import {
  buildDiagnosticsSummary,
  createLogger,
  DiagnosticSink,
  SourceReadError,
  type Logger,
} from '@invoice-bridge/shared';
import { assembleDocument } from './assembler/assemble-document.js';
import { resolveConversionConfig } from './config/conversion-config.js';
import { CONVERTER_SOURCE, createMappingContext } from './mapping/context.js';
import { resolveDocumentType } from './mapping/document-type.js';
import { valueOf } from './mapping/primitives.js';

export interface ConversionOptions {
  /**
   * Overrides merged over the default configuration
   */
  config?: ConversionConfigInput | Readonly<Record<string, unknown>>;
  logger?: Logger;
}

const defaultLogger = createLogger({ prefix: 'converter' });

function convertResolved(
  source: CiiDocument,
  config: Readonly<ConversionConfig>,
  logger: Logger,
  precedingDiagnostics: readonly Diagnostic[],
): ConversionResult {
  const sink = new DiagnosticSink(CONVERTER_SOURCE);
  sink.addAll(precedingDiagnostics);

  const decision = resolveDocumentType(source, config, sink);
  if (decision.basis === 'default') {
    logger.warn('Document type undetermined, using configured default', { documentType: decision.documentType });
  } else {
    logger.debug('Document type resolved', { documentType: decision.documentType, basis: decision.basis });
  }

  const defaultCurrency = valueOf(source.transaction?.settlement?.invoiceCurrencyCode);
  const ctx = createMappingContext(config, sink, defaultCurrency);
  const document = assembleDocument(decision.documentType, source, ctx);
  if (!document) {
    logger.warn('Conversion aborted, mandatory source block missing', { documentType: decision.documentType });
  }

  const summary = buildDiagnosticsSummary(sink.diagnostics);
  logger.debug('Conversion finished', {
    ublVersion: config.ublVersion,
    documentType: decision.documentType,
    errors: summary.totalBySeverity.error,
    warnings: summary.totalBySeverity.warning,
    topCodes: summary.topCodes.map((entry) => entry.code),
  });

  const result: ConversionResult = {
    documentType: decision.documentType,
    ublVersion: config.ublVersion,
    diagnostics: sink.toArray(),
  };
  if (document) {
    result.document = document;
  }
  return result;
}

/**
 * Convert a CII source model to a UBL Invoice or CreditNote.
 *
 * @throws ConfigurationError when `options.config` is invalid
 */
export function convertCiiToUbl(source: CiiDocument, options: ConversionOptions = {}): ConversionResult {
  const config = resolveConversionConfig(options.config);
  return convertResolved(source, config, options.logger ?? defaultLogger, []);
}

/**
 * Read CII XML and convert it. Input that is not readable CII yields a result
 * without document type or document, carrying the reader's diagnostics.
 *
 * @throws ConfigurationError when `options.config` is invalid
 */
export function convertCiiXmlToUbl(xml: string, options: ConversionOptions = {}): ConversionResult {
  const config = resolveConversionConfig(options.config);
  const logger = options.logger ?? defaultLogger;
  const read = readCiiXml(xml);
  if (!read.document) {
    logger.warn('Input is not readable CII', { diagnostics: read.diagnostics.map((d) => d.code) });
    return { ublVersion: config.ublVersion, diagnostics: [...read.diagnostics] };
  }
  return convertResolved(read.document, config, logger, read.diagnostics);
}

/**
 * Read a CII XML file and convert it.
 *
 * @throws SourceReadError when the file cannot be read
 * @throws ConfigurationError when `options.config` is invalid
 */
export async function convertCiiFileToUbl(path: string, options: ConversionOptions = {}): Promise<ConversionResult> {
  let xml: string;
  try {
    xml = await readFile(path, 'utf-8');
  } catch (error) {
    throw new SourceReadError(`Cannot read CII file '${path}'`, { path }, error);
  }
  return convertCiiXmlToUbl(xml, options);
}
