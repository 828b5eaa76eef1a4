/**
 * Date format resolution (UNTDID 2379 format codes)
 */

import { format, isValid, parse } from 'date-fns';
import type { CiiDateTime, ISODate, Result } from '@invoice-bridge/contracts';
import { createDiagnostic, hasText, type DiagnosticSink } from '@invoice-bridge/shared';
import { CONVERTER_SOURCE, fail, ok } from './context.js';

export const DEFAULT_DATE_FORMAT = '102';

const DATE_PATTERNS: Readonly<Record<string, string>> = {
  // DDMMYY
  '2': 'ddMMyy',
  // MMDDYY
  '3': 'MMddyy',
  // DDMMCCYY
  '4': 'ddMMyyyy',
  // YYMMDD
  '101': 'yyMMdd',
  // CCYYMMDD
  '102': 'yyyyMMdd',
  // YYWWD, ISO week date
  '103': 'YYwwe',
  // YYDDD
  '105': 'yyDDD',
};

/**
 * Two-digit years resolve against this date, which places them in 2000-2099.
 * Mid-year so that the week-numbering year equals the calendar year.
 */
const TWO_DIGIT_YEAR_REFERENCE = new Date(2050, 5, 1);

const PARSE_OPTIONS = {
  useAdditionalDayOfYearTokens: true,
  useAdditionalWeekYearTokens: true,
  weekStartsOn: 1,
  firstWeekContainsDate: 4,
} as const;

export function getDatePattern(formatCode: string): Result<string> {
  const pattern = DATE_PATTERNS[formatCode];
  if (pattern === undefined) {
    return fail(
      createDiagnostic(CONVERTER_SOURCE, 'error', 'DATE-UNSUPPORTED-FORMAT', `Unsupported date format '${formatCode}'`, 'field', {
        context: { format: formatCode },
      }),
    );
  }
  return ok(pattern);
}

/**
 * Parse a date string in the given format (102 when absent) to yyyy-MM-dd.
 * A blank value is not an error and yields ok(undefined).
 */
export function parseDate(value: string | undefined, formatCode?: string): Result<ISODate | undefined> {
  if (!hasText(value)) {
    return ok(undefined);
  }
  const effectiveFormat = hasText(formatCode) ? formatCode.trim() : DEFAULT_DATE_FORMAT;
  const pattern = getDatePattern(effectiveFormat);
  if (!pattern.ok) {
    return pattern;
  }

  const trimmed = value.trim();
  // Every supported pattern is purely numeric with fixed-width fields
  const date =
    /^\d+$/.test(trimmed) && trimmed.length === pattern.value.length
      ? parse(trimmed, pattern.value, TWO_DIGIT_YEAR_REFERENCE, PARSE_OPTIONS)
      : undefined;
  if (date === undefined || !isValid(date)) {
    return fail(
      createDiagnostic(
        CONVERTER_SOURCE,
        'error',
        'DATE-PARSE-FAILED',
        `Failed to parse the date '${trimmed}' using format '${effectiveFormat}'`,
        'field',
        { context: { value: trimmed, format: effectiveFormat } },
      ),
    );
  }
  return ok(format(date, 'yyyy-MM-dd'));
}

/**
 * Parse a CII date-time container, recording a failure on the sink
 */
export function parseDateTime(
  dateTime: CiiDateTime | undefined,
  sink: DiagnosticSink,
  path: readonly string[],
): ISODate | undefined {
  if (!dateTime) {
    return undefined;
  }
  const result = parseDate(dateTime.value, dateTime.format);
  if (!result.ok) {
    sink.add({ ...result.error, path });
    return undefined;
  }
  return result.value;
}
