import { humanize, selectUnit } from '../lib/humanize.library.js';
import { Duration } from '../lib/duration.class.js';
import { Chronicle } from '../lib/chronicle.config/chronicle.config.js';
import { InvalidOptionError, InvalidUnitError } from '../lib/error.library.js';
import { FakeLocale } from './fake.provider.js';
import type { Humanize } from '../lib/humanize.library.js';

const label = 'humanize:';
const localeProvider = new FakeLocale();
const span = Duration.fromSeconds(9120);										// 2h 32m

/**
 * Test the threshold-driven humanizer
 */
describe(`${label}`, () => {
  afterEach(() => {
    Chronicle.init();
  })

  describe(`${label} unit selection`, () => {
    test(`${label} the default threshold`, () => {
      expect(selectUnit(9120, 0.85)).toBe('hour');
      expect(span.humanize({ localeProvider })).toBe('3 hours');
    })

    test(`${label} the threshold moves the cut-over`, () => {
      expect(humanize(span, { localeProvider, threshold: 0 })).toBe('0 years');
      expect(humanize(span, { localeProvider, threshold: 0.1 })).toBe('0 days');
      expect(humanize(span, { localeProvider, threshold: 0.2 })).toBe('3 hours');
      expect(humanize(span, { localeProvider, threshold: 5 })).toBe('152 minutes');
      expect(humanize(span, { localeProvider, threshold: 155 })).toBe('9120 seconds');
    })

    test(`${label} seconds are the floor`, () => {
      expect(selectUnit(0, 0.85)).toBe('second');
      expect(humanize(Duration.ZERO, { localeProvider })).toBe('0 seconds');
    })

    test(`${label} the ladder uses nominal months and years`, () => {
      expect(humanize(Duration.of({ day: 30 }), { localeProvider })).toBe('1 month');
      expect(humanize(Duration.of({ day: 365 }), { localeProvider })).toBe('1 year');
      expect(humanize(Duration.of({ day: 6 }), { localeProvider })).toBe('1 week');
    })

    test(`${label} a granularity pins the unit`, () => {
      expect(humanize(span, { localeProvider, granularity: 'minute' })).toBe('152 minutes');
      expect(humanize(span, { localeProvider, granularity: 'week' })).toBe('1 week');
    })

    test(`${label} a non-zero count in the finest unit is at least 1`, () => {
      expect(humanize(Duration.fromSeconds(0.3), { localeProvider })).toBe('1 second');
      expect(humanize(Duration.fromSeconds(-0.3), { localeProvider, addDirection: true })).toBe('1 second ago');
      expect(humanize(span, { localeProvider, granularity: 'day' })).toBe('1 day');
    })

    test(`${label} ties round to the even count`, () => {
      expect(humanize(Duration.of({ hour: 2, minute: 30 }), { localeProvider })).toBe('2 hours');
      expect(humanize(Duration.of({ hour: 3, minute: 30 }), { localeProvider })).toBe('4 hours');
      expect(humanize(Duration.fromSeconds(2.5), { localeProvider })).toBe('2 seconds');
    })

    test(`${label} a granularity must be on the ladder`, () => {
      expect(() => humanize(span, { granularity: 'century' }))
        .toThrow(new InvalidUnitError('century', ['year', 'month', 'week', 'day', 'hour', 'minute', 'second']))
      expect(() => humanize(span, { granularity: 'decade' }))
        .toThrow('Unit must be one of [year, month, week, day, hour, minute, second], not "decade"')
    })
  })

  describe(`${label} phrasing`, () => {
    test(`${label} direction`, () => {
      expect(humanize(span, { localeProvider, addDirection: true })).toBe('in 3 hours');
      expect(humanize(span.negate(), { localeProvider, addDirection: true })).toBe('3 hours ago');
      expect(humanize(Duration.ZERO, { localeProvider, addDirection: true })).toBe('in 0 seconds');
    })

    test(`${label} style`, () => {
      expect(humanize(span, { localeProvider, style: 'short' })).toBe('3 hr');
    })

    test(`${label} an unknown style`, () => {
      const options: Humanize.Config = JSON.parse('{"style":"wide"}');

      expect(() => humanize(span, options)).toThrow(InvalidOptionError);
      expect(() => humanize(span, options)).toThrow('Option "style" must be one of [long, short, narrow], not "wide"');
    })

    test(`${label} the configured provider and direction are the defaults`, () => {
      Chronicle.init({ localeProvider, addDirection: true });

      expect(span.humanize()).toBe('in 3 hours');
    })
  })

  describe(`${label} Intl phrases`, () => {
    test(`${label} en-US units`, () => {
      expect(humanize(span, { locale: 'en-US' })).toBe('3 hours');
      expect(humanize(Duration.fromSeconds(3600), { locale: 'en-US' })).toBe('1 hour');
    })

    test(`${label} en-US relative phrases`, () => {
      expect(humanize(span, { locale: 'en-US', addDirection: true })).toBe('in 3 hours');
      expect(humanize(span.negate(), { locale: 'en-US', addDirection: true })).toBe('3 hours ago');
    })

    test(`${label} counts are not grouped`, () => {
      expect(humanize(span, { locale: 'en-US', threshold: 155 })).toBe('9120 seconds');
      expect(humanize(span, { locale: 'en-US', threshold: 155, addDirection: true })).toBe('in 9120 seconds');
    })
  })
})
