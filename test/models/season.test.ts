/**
 * Tests for default season naming
 */

import { defaultSeasonName } from '../../src/models/season';

describe('defaultSeasonName', () => {
  it('should name February through June as spring', () => {
    expect(defaultSeasonName(new Date(2025, 1, 1))).toBe('Spring 2025');
    expect(defaultSeasonName(new Date(2025, 5, 30))).toBe('Spring 2025');
  });

  it('should name July through October as fall', () => {
    expect(defaultSeasonName(new Date(2025, 6, 1))).toBe('Fall 2025');
    expect(defaultSeasonName(new Date(2025, 9, 31))).toBe('Fall 2025');
  });

  it('should put January in the current year winter', () => {
    expect(defaultSeasonName(new Date(2026, 0, 15))).toBe('Winter 2026');
  });

  it('should put November and December in next year winter', () => {
    expect(defaultSeasonName(new Date(2025, 10, 1))).toBe('Winter 2026');
    expect(defaultSeasonName(new Date(2025, 11, 31))).toBe('Winter 2026');
  });
});
