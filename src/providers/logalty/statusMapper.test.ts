import { describe, it, expect } from 'vitest';
import { normalizeStatus } from './statusMapper.js';

describe('normalizeStatus', () => {
  it.each([
    ['PENDING', 'DRAFT'],
    ['DRAFT', 'DRAFT'],
    ['SENT', 'SENT'],
    ['IN_PROGRESS', 'SENT'],
    ['COMPLETED', 'COMPLETED'],
    ['SIGNED', 'COMPLETED'],
    ['CANCELLED', 'VOIDED'],
    ['VOIDED', 'VOIDED'],
    ['EXPIRED', 'EXPIRED'],
  ])('should map %s to %s', (remote, canonical) => {
    expect(normalizeStatus(remote)).toBe(canonical);
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(normalizeStatus('signed')).toBe('COMPLETED');
    expect(normalizeStatus(' In_Progress ')).toBe('SENT');
  });

  it('should fall back to DRAFT for missing or unknown statuses', () => {
    expect(normalizeStatus(undefined)).toBe('DRAFT');
    expect(normalizeStatus(null)).toBe('DRAFT');
    expect(normalizeStatus('')).toBe('DRAFT');
    expect(normalizeStatus('ARCHIVED')).toBe('DRAFT');
  });

  it('should not resolve object prototype keys', () => {
    expect(normalizeStatus('constructor')).toBe('DRAFT');
  });
});
