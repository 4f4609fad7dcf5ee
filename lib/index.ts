export { Instant } from './instant.class.js';
export { Duration } from './duration.class.js';
export { Timer } from './timer.class.js';
export { Chronicle } from './chronicle.config/chronicle.config.js';

export { parse, parseOutcome } from './parser.library.js';
export { parseDuration } from './duration.grammar.js';
export { humanize, selectUnit } from './humanize.library.js';
export { startOf, endOf, span, spanRange, range } from './span.library.js';
export { compile, Matcher, Renderer } from './token.library.js';

export { IntlLocale } from './locale.provider.js';
export { TemporalZone, LOCAL } from './timezone.provider.js';
export { SPAN_UNIT, TIME, STYLE, KEYWORD, LIMIT } from './chronicle.config/chronicle.enum.js';
export { IsoFamily, UnitAlias } from './chronicle.config/chronicle.default.js';

export {
	ChronicleError, UnsupportedTokenError, ParseError, MatchError,
	InvalidUnitError, RangeOverflowError, TimezoneError, InvalidOptionError,
} from './error.library.js';

export type { Input, ParseOutcome } from './parser.library.js';
export type { SpanBoundary } from './span.library.js';
export type { Humanize } from './humanize.library.js';
export type { Mode, Names, Subject, Matched } from './token.library.js';
export type { LocaleProvider, NameWidth } from './locale.provider.js';
export type { TimezoneProvider, ZoneOffset } from './timezone.provider.js';
export type { CivilFields, CalendarShift } from './calendar.library.js';
export type { SpanUnit, TimeUnit, Style } from './chronicle.config/chronicle.enum.js';
export type { Attempt, ErrorDetail } from './error.library.js';
