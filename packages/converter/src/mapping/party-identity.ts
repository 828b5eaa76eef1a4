/**
 * Which of a trade party's identifiers end up as PartyIdentification
 */

import type { CiiTradeParty, Identifier } from '@invoice-bridge/contracts';
import { hasText } from '@invoice-bridge/shared';
import { copyIdentifier } from './primitives.js';

/**
 * A global identifier is usable only with both a value and a scheme
 */
export function isUsableGlobalId(id: Identifier): boolean {
  return hasText(id.value) && hasText(id.schemeId);
}

export function hasUsableGlobalId(party: CiiTradeParty): boolean {
  return party.globalIds.some(isUsableGlobalId);
}

export function usableGlobalIds(party: CiiTradeParty): Identifier[] {
  return party.globalIds.filter(isUsableGlobalId);
}

/**
 * First usable global identifier, else the first local identifier
 */
export function firstPartyId(party: CiiTradeParty): Identifier | undefined {
  return copyIdentifier(usableGlobalIds(party)[0] ?? party.ids[0]);
}

/**
 * All usable global identifiers, else all local identifiers
 */
export function allPartyIds(party: CiiTradeParty): Identifier[] {
  const source = hasUsableGlobalId(party) ? usableGlobalIds(party) : party.ids;
  return source.map(copyIdentifier).filter((id): id is Identifier => id !== undefined);
}

/**
 * Append an identifier unless one with the same value and scheme is present
 */
export function addDeduplicatedId(target: Identifier[], id: Identifier | undefined): void {
  if (!id) {
    return;
  }
  const exists = target.some((existing) => existing.value === id.value && existing.schemeId === id.schemeId);
  if (!exists) {
    target.push(id);
  }
}
