/**
 * Primitive field copies
 *
 * Every copy returns undefined for an absent source or an empty value, so no
 * empty element ever reaches the target document. Numeric values lose their
 * trailing fractional zeroes.
 */

import type { Amount, Code, Identifier, Quantity, Text } from '@invoice-bridge/contracts';
import { assignDefined, hasText, isValidDecimalAmount, stripTrailingZeros } from '@invoice-bridge/shared';

export function copyIdentifier(source: Identifier | undefined): Identifier | undefined {
  if (!source || !hasText(source.value)) {
    return undefined;
  }
  return { ...source };
}

export function copyText(source: Text | undefined): Text | undefined {
  if (!source || !hasText(source.value)) {
    return undefined;
  }
  return { ...source };
}

export function copyCode(source: Code | undefined): Code | undefined {
  if (!source || !hasText(source.value)) {
    return undefined;
  }
  return { ...source };
}

/**
 * Canonical form of a decimal string, or undefined when it is empty or not a decimal
 */
export function canonicalDecimal(value: string | undefined): string | undefined {
  if (!hasText(value) || !isValidDecimalAmount(value.trim())) {
    return undefined;
  }
  return stripTrailingZeros(value.trim());
}

export function copyQuantity(source: Quantity | undefined): Quantity | undefined {
  const value = canonicalDecimal(source?.value);
  if (!source || value === undefined) {
    return undefined;
  }
  return { ...source, value };
}

/**
 * Copy an amount; the default currency is used only when the source has none.
 */
export function copyAmount(source: Amount | undefined, defaultCurrency: string | undefined): Amount | undefined {
  const value = canonicalDecimal(source?.value);
  if (!source || value === undefined) {
    return undefined;
  }
  const amount: Amount = { value };
  assignDefined(amount, 'currencyId', hasText(source.currencyId) ? source.currencyId : defaultCurrency);
  assignDefined(amount, 'currencyCodeListVersionId', source.currencyCodeListVersionId);
  return amount;
}

/**
 * Plain value of a text, identifier or code when it has content
 */
export function valueOf(source: { value: string } | undefined): string | undefined {
  return source && hasText(source.value) ? source.value : undefined;
}
