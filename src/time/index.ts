export { cnToInt } from './numerals.js';
export { extractTimeOfDay } from './time-of-day.js';
export { resolveRelativeDate } from './relative-date.js';
export { parseTime, normalizeTimeText, TIME_MATCHERS, type TimeMatcher } from './time-parser.js';
export { formatAbsolute, formatRelative, NOT_SET } from './format.js';
export {
  prefixSplitter,
  splitContentAndTime,
  type ContentTimeSplitter,
  type SplitResult,
} from './splitter.js';
export type { TimeOfDay } from './calendar.js';
