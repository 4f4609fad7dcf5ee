import { parse, parseOutcome } from '../lib/parser.library.js';
import { Instant } from '../lib/instant.class.js';
import { Chronicle } from '../lib/chronicle.config/chronicle.config.js';
import { IsoFamily } from '../lib/chronicle.config/chronicle.default.js';
import { ParseError, RangeOverflowError, TimezoneError } from '../lib/error.library.js';
import { FakeLocale, FakeZone } from './fake.provider.js';
import type { NameWidth } from '../lib/locale.provider.js';

const label = 'parse:';

/** month names that can be changed between calls */
class RenamingLocale extends FakeLocale {
  prefix = '';

  months(locale: string, width: NameWidth) {
    return super.months(locale, width).map(name => this.prefix + name);
  }
}

const localeProvider = new FakeLocale();
const timezoneProvider = new FakeZone();

/**
 * Test the multi-format parser
 */
describe(`${label}`, () => {
  afterEach(() => {
    Chronicle.init();
  })

  describe(`${label} ISO-8601`, () => {
    test(`${label} an explicit offset is converted to UTC`, () => {
      expect(parse('2016-07-25T21:33:18+02:00').toString())
        .toBe('2016-07-25T19:33:18+00:00')
    })

    test(`${label} reports the family member that matched`, () => {
      const outcome = parseOutcome('2016-07-25T21:33:18+02:00');

      expect(outcome.format).toBe('ISO8601');
      expect(outcome.pattern).toBe(IsoFamily[1]);
    })

    test(`${label} fractional seconds`, () => {
      expect(parse('2016-07-25T19:33:18.5Z').toString())
        .toBe('2016-07-25T19:33:18.500000+00:00')
    })

    test(`${label} date only, and year-month only`, () => {
      expect(parse('2016-07-25').toString()).toBe('2016-07-25T00:00:00+00:00');
      expect(parse('2016-07').toString()).toBe('2016-07-01T00:00:00+00:00');
    })

    test(`${label} the keyword is case-insensitive`, () => {
      expect(parseOutcome('2016-07-25', 'iso8601').pattern).toBe('yyyy-MM-dd');
    })
  })

  describe(`${label} timestamps`, () => {
    test(`${label} an integer number`, () => {
      expect(parse(1469475198).toString()).toBe('2016-07-25T19:33:18+00:00');
    })

    test(`${label} a fractional number`, () => {
      expect(parse(1469475198.5).epochMicroseconds).toBe(1_469_475_198_500_000n);
    })

    test(`${label} decimal text`, () => {
      expect(parseOutcome('1469475198', 'timestamp').instant.timestamp).toBe(1469475198);
    })

    test(`${label} digits beyond the microsecond are rounded half-to-even`, () => {
      expect(parse('0.0000025', 'timestamp').epochMicroseconds).toBe(2n);
      expect(parse('0.0000035', 'timestamp').epochMicroseconds).toBe(4n);
    })
  })

  describe(`${label} numeric input`, () => {
    test(`${label} is matched against numeric patterns`, () => {
      const outcome = parseOutcome(20160725, '%Y%m%d');

      expect(outcome.instant.toString()).toBe('2016-07-25T00:00:00+00:00');
      expect(outcome.format).toBe('%Y%m%d');
    })

    test(`${label} skips non-numeric patterns and falls back to timestamp`, () => {
      const outcome = parseOutcome(1469475198, ['%d %B %Y'], undefined, { localeProvider });

      expect(outcome.format).toBe('timestamp');
      expect(outcome.instant.toString()).toBe('2016-07-25T19:33:18+00:00');
    })
  })

  describe(`${label} candidates`, () => {
    test(`${label} the first matching candidate wins`, () => {
      const outcome = parseOutcome('25 July 2016', ['%Y-%m-%d', '%d %B %Y', 'd MMMM yyyy'], undefined, { localeProvider });

      expect(outcome.format).toBe('%d %B %Y');
      expect(outcome.instant.toString()).toBe('2016-07-25T00:00:00+00:00');
    })

    test(`${label} every failed candidate is reported`, () => {
      expect(() => parse('not a date', ['%Y-%m-%d', 'timestamp']))
        .toThrow('Value "not a date" does not match any format in ["%Y-%m-%d" (no match), "timestamp" (Not a decimal number: not a date)]')
    })

    test(`${label} keyword expansions appear in the attempts`, () => {
      let error: unknown;
      try {
        parse('garbage');
      } catch (err) {
        error = err;
      }

      expect(error).toBeInstanceOf(ParseError);
      if (!(error instanceof ParseError))
        return;

      expect(error.value).toBe('garbage');
      expect(error.attempted).toHaveLength(IsoFamily.length + 1);
      expect(error.attempted[0]).toEqual({ format: 'ISO8601', pattern: IsoFamily[0], reason: 'no match' });
      expect(error.message).toContain(`"ISO8601 ${IsoFamily[0]}" (no match)`);
    })

    test(`${label} a field out of range is a candidate failure`, () => {
      expect(() => parse('2016-02-30', '%Y-%m-%d'))
        .toThrow('Value "2016-02-30" does not match any format in ["%Y-%m-%d" (day 30 is out of range for 2016-02)]')
    })

    test(`${label} an unsupported token is a candidate failure`, () => {
      expect(parseOutcome('2016', ['%Y %Z', '%Y']).format).toBe('%Y');
    })

    test(`${label} a custom pattern reads the provider's current names`, () => {
      const renaming = new RenamingLocale();
      const options = { localeProvider: renaming };

      expect(parse('25 Jul 2016', '%d %b %Y', undefined, options).toString()).toBe('2016-07-25T00:00:00+00:00');

      renaming.prefix = 'x';
      expect(parse('25 xJul 2016', '%d %b %Y', undefined, options).toString()).toBe('2016-07-25T00:00:00+00:00');
    })

    test(`${label} the configured formats are the default`, () => {
      Chronicle.init({ formats: '%d/%m/%Y' });

      expect(parse('25/07/2016').toString()).toBe('2016-07-25T00:00:00+00:00');
    })
  })

  describe(`${label} zones`, () => {
    test(`${label} a default zone applies to text without an offset`, () => {
      expect(parse('2016-07-25 12:00', 'yyyy-MM-dd HH:mm', 'Fixed/Plus1', { timezoneProvider }).toString())
        .toBe('2016-07-25T11:00:00+00:00')
    })

    test(`${label} an explicit offset wins over the default zone`, () => {
      expect(parse('2016-07-25T12:00:00+00:00', undefined, 'Fixed/Plus1', { timezoneProvider }).toString())
        .toBe('2016-07-25T12:00:00+00:00')
    })

    test(`${label} an IANA zone`, () => {
      expect(parse('2016-07-25 12:00', 'yyyy-MM-dd HH:mm', 'America/New_York').toString())
        .toBe('2016-07-25T16:00:00+00:00')
    })

    test(`${label} an unknown zone fails before any candidate is tried`, () => {
      expect(() => parse('garbage', undefined, 'Not/AZone'))
        .toThrow(new TimezoneError('Not/AZone'))
      expect(() => parse('garbage', undefined, 'Not/AZone'))
        .toThrow('Unrecognized timezone: Not/AZone')
    })
  })

  describe(`${label} round trip`, () => {
    const instant = Instant.of({ year: 2016, month: 7, day: 25, hour: 19, minute: 33, second: 18, microsecond: 123456 });
    const lossless = [
      '%Y-%m-%d %H:%M:%S.%f%z',
      '%Y-%m-%d %H:%M:%S.%f%:z',
      'EEEE, MMMM d yyyy hh:mm:ss.SSSSSS a',
      '%a %b %d %Y %I:%M:%S.%f %p',
      'DDD yyyy HH mm ss SSSSSS',
      `yyyy-MM-dd'T'HH:mm:ss.SSSSSSZZZZZ`,
    ]

    test.each(lossless)(`${label} %s`, pattern => {
      Chronicle.init({ localeProvider });

      expect(parse(instant.format(pattern), pattern).equals(instant)).toBe(true);
    })

    test(`${label} the default ISO form`, () => {
      expect(parse(instant.toString()).equals(instant)).toBe(true);
    })

    test(`${label} whole seconds as a timestamp`, () => {
      const whole = instant.replace({ microsecond: 0 });

      expect(parse(whole.format('%s'), '%s').equals(whole)).toBe(true);
    })
  })

  describe(`${label} range`, () => {
    test(`${label} a value beyond 9999-12-31 raises when no candidate matches`, () => {
      expect(() => parse('9999-12-31T23:00:00-02:00'))
        .toThrow(RangeOverflowError)
      expect(() => parse('999999999999', 'timestamp'))
        .toThrow('Instant is outside the range 0001-01-01T00:00:00.000000+00:00 … 9999-12-31T23:59:59.999999+00:00')
    })

    test(`${label} a later candidate still wins after an out-of-range one`, () => {
      const outcome = parseOutcome('20160725193318', ['timestamp', 'yyyyMMddHHmmss']);

      expect(outcome.instant.toString()).toBe('2016-07-25T19:33:18+00:00');
      expect(outcome.format).toBe('yyyyMMddHHmmss');
    })

    test(`${label} the earliest instant`, () => {
      expect(parse('0001-01-01').toString()).toBe('0001-01-01T00:00:00+00:00');
    })
  })
})
