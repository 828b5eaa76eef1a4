import { describe, it, expect } from 'vitest';
import { assignDefined, hasText } from './assign.js';

interface Sample {
  id: string;
  name?: string;
}

describe('assignDefined', () => {
  it('should set present values', () => {
    const sample: Sample = { id: '1' };
    assignDefined(sample, 'name', 'Acme');
    expect(sample).toEqual({ id: '1', name: 'Acme' });
  });

  it('should leave the property out for undefined', () => {
    const sample: Sample = { id: '1' };
    assignDefined(sample, 'name', undefined);
    expect('name' in sample).toBe(false);
  });

  it('should keep empty strings', () => {
    const sample: Sample = { id: '1' };
    assignDefined(sample, 'name', '');
    expect(sample.name).toBe('');
  });
});

describe('hasText', () => {
  it('should reject absent and blank strings', () => {
    expect(hasText(undefined)).toBe(false);
    expect(hasText(null)).toBe(false);
    expect(hasText('   ')).toBe(false);
    expect(hasText('x')).toBe(true);
  });
});
