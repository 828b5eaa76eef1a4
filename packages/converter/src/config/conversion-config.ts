/**
 * Conversion configuration
 *
 * Defaults plus caller overrides, validated and frozen. The resolved value is
 * passed explicitly to every conversion call; nothing reads configuration
 * from module state.
 */

import type {
  ConversionConfig,
  ConversionConfigInput,
  CreationMode,
  UblDocumentType,
  UblVersion,
} from '@invoice-bridge/contracts';
import { ConfigurationError } from '@invoice-bridge/shared';

export const DEFAULT_CONVERSION_CONFIG: Readonly<ConversionConfig> = Object.freeze({
  creationMode: 'automatic',
  undeterminedDocumentType: 'Invoice',
  ublVersion: '2.3',
  vatScheme: 'VAT',
  customizationId: 'urn:cen.eu:en16931:2017#compliant#urn:fdc:peppol.eu:2017:poacc:billing:3.0',
  profileId: 'urn:fdc:peppol.eu:2017:poacc:billing:01:1.0',
  cardAccountNetworkId: 'mapped-from-cii',
  defaultOrderReferenceId: 'NA',
  swapQuantitySignIfNeeded: true,
  swapPriceSignIfNeeded: true,
});

const CREATION_MODES: readonly CreationMode[] = ['automatic', 'force-invoice', 'force-credit-note'];
const UBL_VERSIONS: readonly UblVersion[] = ['2.1', '2.2', '2.3', '2.4'];
const DOCUMENT_TYPES: readonly UblDocumentType[] = ['Invoice', 'CreditNote'];

type StringOption = 'vatScheme' | 'customizationId' | 'profileId' | 'cardAccountNetworkId' | 'defaultOrderReferenceId';
type BooleanOption = 'swapQuantitySignIfNeeded' | 'swapPriceSignIfNeeded';

const STRING_OPTIONS: readonly StringOption[] = [
  'vatScheme',
  'customizationId',
  'profileId',
  'cardAccountNetworkId',
  'defaultOrderReferenceId',
];
const BOOLEAN_OPTIONS: readonly BooleanOption[] = ['swapQuantitySignIfNeeded', 'swapPriceSignIfNeeded'];

/**
 * Options that may be empty: an empty value keeps the source document's own id
 */
const EMPTY_ALLOWED: readonly StringOption[] = ['customizationId', 'profileId'];

function oneOf<T extends string>(option: string, value: unknown, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigurationError(`Invalid value '${String(value)}' for '${option}'`, {
      option,
      allowed: [...allowed],
    });
  }
  return match;
}

function isOption<T extends string>(key: string, options: readonly T[]): key is T {
  return options.some((option) => option === key);
}

/**
 * Merge overrides over the defaults and validate the result.
 * Accepts untyped input (e.g. parsed from a JSON file) as well as typed overrides.
 *
 * @throws ConfigurationError for unknown options, values of the wrong type,
 *   unknown enumeration values and empty mandatory strings
 */
export function resolveConversionConfig(
  input: ConversionConfigInput | Readonly<Record<string, unknown>> = {},
): Readonly<ConversionConfig> {
  const config: ConversionConfig = { ...DEFAULT_CONVERSION_CONFIG };

  const entries: [string, unknown][] = Object.entries(input);
  for (const [key, value] of entries) {
    if (value === undefined) {
      continue;
    }
    if (key === 'creationMode') {
      config.creationMode = oneOf(key, value, CREATION_MODES);
    } else if (key === 'ublVersion') {
      config.ublVersion = oneOf(key, value, UBL_VERSIONS);
    } else if (key === 'undeterminedDocumentType') {
      config.undeterminedDocumentType = oneOf(key, value, DOCUMENT_TYPES);
    } else if (isOption(key, STRING_OPTIONS)) {
      if (typeof value !== 'string') {
        throw new ConfigurationError(`'${key}' must be a string`, { option: key });
      }
      if (value.trim().length === 0 && !EMPTY_ALLOWED.includes(key)) {
        throw new ConfigurationError(`'${key}' must not be empty`, { option: key });
      }
      config[key] = value;
    } else if (isOption(key, BOOLEAN_OPTIONS)) {
      if (typeof value !== 'boolean') {
        throw new ConfigurationError(`'${key}' must be a boolean`, { option: key });
      }
      config[key] = value;
    } else {
      throw new ConfigurationError(`Unknown configuration option '${key}'`, { option: key });
    }
  }

  return Object.freeze(config);
}
