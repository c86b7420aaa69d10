import { describe, it, expect } from 'vitest';
import { SecurityService } from './security.js';

describe('SecurityService.maskSecret', () => {
  it('should keep the first and last four characters of long values', () => {
    expect(SecurityService.maskSecret('pk1_0123456789abcdef')).toBe('pk1_****cdef');
  });

  it('should mask short values entirely', () => {
    expect(SecurityService.maskSecret('test-secret')).toBe('***********');
  });

  it('should describe missing values', () => {
    expect(SecurityService.maskSecret(undefined)).toBe('(unset)');
    expect(SecurityService.maskSecret('')).toBe('(unset)');
  });
});
