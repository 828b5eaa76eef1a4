import type { CiiAccountingAccount, CiiNote, Text } from '@invoice-bridge/contracts';
import { hasText } from '@invoice-bridge/shared';
import { valueOf } from '../mapping/primitives.js';

/**
 * One UBL note per CII note. The subject code travels as a `#code#` prefix,
 * multiple content parts are joined by newlines.
 */
export function convertNotes(notes: readonly CiiNote[]): Text[] {
  const result: Text[] = [];
  for (const note of notes) {
    const content = note.contents
      .map((part) => part.value)
      .join('\n');
    const subject = valueOf(note.subjectCode);
    const value = subject === undefined ? content : `#${subject.trim()}#${content}`;
    if (!hasText(value)) {
      continue;
    }
    const text: Text = { value };
    const languageId = note.contents[0]?.languageId;
    if (languageId !== undefined) {
      text.languageId = languageId;
    }
    result.push(text);
  }
  return result;
}

/**
 * BT-19 / BT-133: the first receivable account with an id
 */
export function firstAccountingCost(accounts: readonly CiiAccountingAccount[]): string | undefined {
  for (const account of accounts) {
    const id = valueOf(account.id);
    if (id !== undefined) {
      return id;
    }
  }
  return undefined;
}
