// src/common/utils/time.util.spec.ts
import { hhmmToMin, minToCompact, minToHhmm, parseHhmm, SERVICE_DAY_END_MIN } from './time.util';

describe('time.util', () => {
  describe('parseHhmm', () => {
    it('should convert HH:mm to minutes of the service day', () => {
      expect(parseHhmm('00:00')).toBe(0);
      expect(parseHhmm('08:05')).toBe(485);
      expect(parseHhmm('8:05')).toBe(485);
      expect(parseHhmm(' 23:59 ')).toBe(1439);
    });

    it('should accept after-midnight service up to 30:00', () => {
      expect(parseHhmm('25:10')).toBe(1510);
      expect(parseHhmm('30:00')).toBe(SERVICE_DAY_END_MIN);
      expect(parseHhmm('30:01')).toBeNull();
    });

    it('should return null for malformed input', () => {
      expect(parseHhmm('8h05')).toBeNull();
      expect(parseHhmm('08:60')).toBeNull();
      expect(parseHhmm('0805')).toBeNull();
      expect(parseHhmm('')).toBeNull();
    });
  });

  it('hhmmToMin should throw a RangeError on malformed input', () => {
    expect(hhmmToMin('12:30')).toBe(750);
    expect(() => hhmmToMin('noon')).toThrow(RangeError);
  });

  it('minToHhmm should pad hours and minutes', () => {
    expect(minToHhmm(0)).toBe('00:00');
    expect(minToHhmm(485)).toBe('08:05');
    expect(minToHhmm(1510)).toBe('25:10');
  });

  it('minToCompact should drop the separator', () => {
    expect(minToCompact(485)).toBe('0805');
    expect(minToCompact(1380)).toBe('2300');
  });
});
