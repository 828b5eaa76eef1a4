/**
 * Bridge to an external conformance validator (XSD / Schematron).
 *
 * The converted document is serialized and handed to the service; every
 * reported message becomes a `validation` diagnostic on a copy of the result.
 */

import type {
  ConversionResult,
  Diagnostic,
  ValidationMessage,
  ValidationReport,
  ValidationService,
} from '@invoice-bridge/contracts';
import { ValidationServiceError } from '@invoice-bridge/shared';
import { writeUblXml } from '@invoice-bridge/ubl-writer';

export const VALIDATION_SOURCE = 'validation-service';

const UNNAMED_RULE_CODE = 'VALIDATION-MESSAGE';

export function validationMessagesToDiagnostics(report: ValidationReport): Diagnostic[] {
  return report.messages.map((message: ValidationMessage) => {
    const diagnostic: Diagnostic = {
      code: message.ruleId ?? UNNAMED_RULE_CODE,
      message: message.message,
      severity: message.severity,
      category: 'validation',
      source: report.validator ?? VALIDATION_SOURCE,
    };
    if (message.location !== undefined) {
      diagnostic.context = { location: message.location };
    }
    return diagnostic;
  });
}

/**
 * Validate the converted document. Results without a document are returned as they are.
 *
 * @throws ValidationServiceError when the service fails to produce a report
 */
export async function validateConversionResult(
  result: ConversionResult,
  service: ValidationService,
): Promise<ConversionResult> {
  const document = result.document;
  if (!document) {
    return result;
  }

  const xml = writeUblXml(document);
  let report: ValidationReport;
  try {
    report = await service.validate(xml, { documentType: document.kind, ublVersion: result.ublVersion });
  } catch (error) {
    throw new ValidationServiceError(
      'Validation service failed',
      { documentType: document.kind, ublVersion: result.ublVersion },
      error,
    );
  }

  return {
    ...result,
    diagnostics: [...result.diagnostics, ...validationMessagesToDiagnostics(report)],
  };
}
