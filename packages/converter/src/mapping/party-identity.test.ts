import { describe, it, expect } from 'vitest';
import type { CiiTradeParty, Identifier } from '@invoice-bridge/contracts';
import {
  addDeduplicatedId,
  allPartyIds,
  firstPartyId,
  hasUsableGlobalId,
  usableGlobalIds,
} from './party-identity.js';

function tradeParty(ids: Identifier[], globalIds: Identifier[]): CiiTradeParty {
  return {
    ids,
    globalIds,
    descriptions: [],
    contacts: [],
    uriCommunications: [],
    taxRegistrations: [],
  };
}

describe('party identity', () => {
  it('should use only global ids with value and scheme', () => {
    const party = tradeParty([], [{ value: '111' }, { value: '4000001000005', schemeId: '0088' }]);

    expect(hasUsableGlobalId(party)).toBe(true);
    expect(usableGlobalIds(party)).toEqual([{ value: '4000001000005', schemeId: '0088' }]);
    expect(firstPartyId(party)).toEqual({ value: '4000001000005', schemeId: '0088' });
  });

  it('should fall back to the first local id', () => {
    const party = tradeParty([{ value: 'LOCAL-1' }, { value: 'LOCAL-2' }], [{ value: '', schemeId: '0088' }]);

    expect(hasUsableGlobalId(party)).toBe(false);
    expect(firstPartyId(party)).toEqual({ value: 'LOCAL-1' });
  });

  it('should return nothing without ids', () => {
    expect(firstPartyId(tradeParty([], []))).toBeUndefined();
    expect(allPartyIds(tradeParty([], []))).toEqual([]);
  });

  it('should return all usable global ids in multi-id mode', () => {
    const party = tradeParty(
      [{ value: 'LOCAL-1' }],
      [
        { value: 'G-1', schemeId: '0088' },
        { value: 'G-2' },
        { value: 'G-3', schemeId: '0060' },
      ],
    );

    expect(allPartyIds(party)).toEqual([
      { value: 'G-1', schemeId: '0088' },
      { value: 'G-3', schemeId: '0060' },
    ]);
  });

  it('should return all local ids when no global id is usable', () => {
    const party = tradeParty([{ value: 'LOCAL-1' }, { value: '' }, { value: 'LOCAL-2' }], [{ value: 'G-2' }]);

    expect(allPartyIds(party)).toEqual([{ value: 'LOCAL-1' }, { value: 'LOCAL-2' }]);
  });
});

describe('addDeduplicatedId', () => {
  it('should skip ids with the same value and scheme', () => {
    const target: Identifier[] = [{ value: 'DE98ZZZ09999999999', schemeId: 'SEPA' }];

    addDeduplicatedId(target, { value: 'DE98ZZZ09999999999', schemeId: 'SEPA' });
    addDeduplicatedId(target, { value: 'DE98ZZZ09999999999' });
    addDeduplicatedId(target, undefined);

    expect(target).toEqual([
      { value: 'DE98ZZZ09999999999', schemeId: 'SEPA' },
      { value: 'DE98ZZZ09999999999' },
    ]);
  });
});
