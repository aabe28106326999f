import { isPlaceholder, parseFloatValue, parseIntValue, parseStringValue, roundTo } from '../values';

describe('header value parsing', () => {
  it('should recognize placeholder values', () => {
    expect(isPlaceholder('')).toBe(true);
    expect(isPlaceholder('  (float) ')).toBe(true);
    expect(isPlaceholder('N/A')).toBe(true);
    expect(isPlaceholder('None')).toBe(true);
    expect(isPlaceholder('0')).toBe(false);
  });

  it('should parse floats and reject non-numeric text', () => {
    expect(parseFloatValue(' 2300.000 ')).toBe(2300);
    expect(parseFloatValue('(3.5)')).toBe(3.5);
    expect(parseFloatValue('1.13452e-002')).toBe(0.0113452);
    expect(parseFloatValue('abc')).toBeNull();
    expect(parseFloatValue('(integer)')).toBeNull();
    expect(parseFloatValue(undefined)).toBeNull();
    expect(parseFloatValue(null)).toBeNull();
  });

  it('should truncate integers', () => {
    expect(parseIntValue('4')).toBe(4);
    expect(parseIntValue('39.9')).toBe(39);
    expect(parseIntValue('?')).toBeNull();
  });

  it('should trim strings and drop placeholders', () => {
    expect(parseStringValue('  Head First Supine ')).toBe('Head First Supine');
    expect(parseStringValue('null')).toBeNull();
  });

  it('should round to a fixed number of decimals', () => {
    expect(roundTo(0.1 + 0.2, 6)).toBe(0.3);
    expect(roundTo(0.000287875821885, 8)).toBe(0.00028788);
    expect(roundTo(2.3, 0)).toBe(2);
  });
});
