import { Instant } from '../lib/instant.class.js';
import { startOf, endOf, span, spanRange, range } from '../lib/span.library.js';
import { InvalidUnitError, RangeOverflowError } from '../lib/error.library.js';
import type { SpanUnit } from '../lib/chronicle.config/chronicle.enum.js';

const label = 'span:';
const wednesday = Instant.of({ year: 2016, month: 7, day: 27, hour: 19, minute: 33, second: 18, microsecond: 500000 });

/** ISO text for each instant */
const text = (list: Iterable<Instant>) => [...list].map(String);

/**
 * Test the span engine
 */
describe(`${label}`, () => {

  describe(`${label} startOf`, () => {
    const starts: [SpanUnit, string][] = [
      ['century', '2000-01-01T00:00:00+00:00'],
      ['decade', '2010-01-01T00:00:00+00:00'],
      ['year', '2016-01-01T00:00:00+00:00'],
      ['month', '2016-07-01T00:00:00+00:00'],
      ['week', '2016-07-25T00:00:00+00:00'],
      ['day', '2016-07-27T00:00:00+00:00'],
      ['hour', '2016-07-27T19:00:00+00:00'],
      ['minute', '2016-07-27T19:33:00+00:00'],
      ['second', '2016-07-27T19:33:18+00:00'],
    ]

    test.each(starts)(`${label} %s`, (unit, expected) => {
      expect(startOf(unit, wednesday).toString()).toBe(expected);
    })

    test(`${label} a century before year 100 is out of range`, () => {
      expect(() => startOf('century', Instant.of({ year: 50, month: 6, day: 1 })))
        .toThrow('Year 0 is out of range 1 … 9999')
    })

    test(`${label} an unknown unit`, () => {
      const unit: SpanUnit = JSON.parse('"fortnight"');

      expect(() => startOf(unit, wednesday)).toThrow(InvalidUnitError);
      expect(() => startOf(unit, wednesday))
        .toThrow('Unit must be one of [century, decade, year, month, week, day, hour, minute, second], not "fortnight"')
    })
  })

  describe(`${label} endOf`, () => {
    test(`${label} month ends follow the calendar`, () => {
      expect(endOf('month', Instant.of({ year: 2016, month: 2, day: 10 })).toString()).toBe('2016-02-29T23:59:59.999999+00:00');
      expect(endOf('month', Instant.of({ year: 2015, month: 2, day: 10 })).toString()).toBe('2015-02-28T23:59:59.999999+00:00');
    })

    test(`${label} a count extends the span`, () => {
      expect(endOf('month', Instant.of({ year: 2016, month: 1, day: 15 }), 2).toString()).toBe('2016-02-29T23:59:59.999999+00:00');
    })

    test(`${label} week ends on Sunday`, () => {
      expect(endOf('week', wednesday).toString()).toBe('2016-07-31T23:59:59.999999+00:00');
    })

    test(`${label} century`, () => {
      expect(endOf('century', Instant.of({ year: 1999, month: 12, day: 31 })).toString()).toBe('1999-12-31T23:59:59.999999+00:00');
    })

    test(`${label} the last representable year`, () => {
      expect(endOf('year', Instant.of({ year: 9999, month: 6, day: 1 })).equals(Instant.MAX)).toBe(true);
      expect(() => endOf('year', Instant.MAX, 2)).toThrow(RangeOverflowError);
    })

    test(`${label} count must be a positive integer`, () => {
      expect(() => endOf('day', wednesday, 0)).toThrow(new RangeError('Span count must be a positive integer, not 0'));
      expect(() => span('day', wednesday, 1.5)).toThrow(RangeError);
    })
  })

  describe(`${label} span`, () => {
    test(`${label} start and end`, () => {
      expect(span('day', wednesday).map(String)).toEqual(['2016-07-27T00:00:00+00:00', '2016-07-27T23:59:59.999999+00:00']);
      expect(span('hour', wednesday, 2).map(String)).toEqual(['2016-07-27T19:00:00+00:00', '2016-07-27T20:59:59.999999+00:00']);
    })
  })

  describe(`${label} spanRange`, () => {
    test(`${label} begins at the span containing start`, () => {
      const spans = [...spanRange('month', Instant.of({ year: 2016, month: 1, day: 15 }), Instant.of({ year: 2016, month: 4, day: 1 }))];

      expect(spans.map(([start]) => start.toString())).toEqual(['2016-01-01T00:00:00+00:00', '2016-02-01T00:00:00+00:00', '2016-03-01T00:00:00+00:00']);
      expect(spans[1][1].toString()).toBe('2016-02-29T23:59:59.999999+00:00');
    })

    test(`${label} a span starting at end is excluded`, () => {
      const spans = spanRange('day', Instant.of({ year: 2016, month: 7, day: 25, hour: 12 }), Instant.of({ year: 2016, month: 7, day: 27 }));

      expect([...spans]).toHaveLength(2);
    })

    test(`${label} steps by count`, () => {
      const spans = spanRange('hour', Instant.of({ year: 2016, month: 7, day: 25, hour: 10, minute: 30 }), Instant.of({ year: 2016, month: 7, day: 25, hour: 15 }), 2);

      expect([...spans].map(pair => pair.map(String))).toEqual([
        ['2016-07-25T10:00:00+00:00', '2016-07-25T11:59:59.999999+00:00'],
        ['2016-07-25T12:00:00+00:00', '2016-07-25T13:59:59.999999+00:00'],
        ['2016-07-25T14:00:00+00:00', '2016-07-25T15:59:59.999999+00:00'],
      ])
    })

    test(`${label} can be iterated again`, () => {
      const spans = spanRange('week', wednesday, Instant.of({ year: 2016, month: 8, day: 15 }));

      expect([...spans]).toHaveLength(3);
      expect([...spans]).toHaveLength(3);
    })

    test(`${label} arguments are checked before iterating`, () => {
      expect(() => spanRange('day', wednesday, wednesday, -1)).toThrow(RangeError);
    })
  })

  describe(`${label} range`, () => {
    test(`${label} month steps do not drift after a short month`, () => {
      const list = range('month', Instant.of({ year: 2016, month: 1, day: 31 }), Instant.of({ year: 2016, month: 6, day: 1 }));

      expect(text(list)).toEqual([
        '2016-01-31T00:00:00+00:00',
        '2016-02-29T00:00:00+00:00',
        '2016-03-31T00:00:00+00:00',
        '2016-04-30T00:00:00+00:00',
        '2016-05-31T00:00:00+00:00',
      ])
    })

    test(`${label} leap days`, () => {
      const list = range('year', Instant.of({ year: 2016, month: 2, day: 29 }), Instant.of({ year: 2021, month: 1, day: 1 }));

      expect(text(list)).toEqual([
        '2016-02-29T00:00:00+00:00',
        '2017-02-28T00:00:00+00:00',
        '2018-02-28T00:00:00+00:00',
        '2019-02-28T00:00:00+00:00',
        '2020-02-29T00:00:00+00:00',
      ])
    })

    test(`${label} start is not truncated`, () => {
      const list = range('minute', wednesday, wednesday.shift({ minutes: 2 }));

      expect(text(list)).toEqual(['2016-07-27T19:33:18.500000+00:00', '2016-07-27T19:34:18.500000+00:00']);
    })

    test(`${label} an empty range`, () => {
      expect(text(range('day', wednesday, Instant.EPOCH))).toEqual([]);
    })

    test(`${label} the static form`, () => {
      expect(text(Instant.range('day', wednesday, wednesday.shift({ days: 2 }), 1))).toHaveLength(2);
    })
  })
})
