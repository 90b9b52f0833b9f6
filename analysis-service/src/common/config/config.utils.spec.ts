import { ConfigService } from '@nestjs/config';
import { getInteger, getNumber } from './config.utils';

describe('config utils', () => {
  const config = new ConfigService({
    TEMPERATURE: '0.7',
    TOP_K: '4.9',
    BLANK: '',
    GARBAGE: 'fast',
    NEGATIVE: '-3',
  });

  it('coerces numeric strings', () => {
    expect(getNumber(config, 'TEMPERATURE', 0.3)).toBe(0.7);
  });

  it('falls back on missing, blank or non-numeric values', () => {
    expect(getNumber(config, 'UNSET_SETTING', 5)).toBe(5);
    expect(getNumber(config, 'BLANK', 5)).toBe(5);
    expect(getNumber(config, 'GARBAGE', 5)).toBe(5);
  });

  it('floors and clamps integers', () => {
    expect(getInteger(config, 'TOP_K', 3)).toBe(4);
    expect(getInteger(config, 'NEGATIVE', 3)).toBe(1);
    expect(getInteger(config, 'NEGATIVE', 3, 0)).toBe(0);
  });
});
