export {
  resolveDate, chronoGrammar, formatTimestamp, endOfDayAt,
  TIMESTAMP_FORMAT, DATE_HINT,
} from './date-parser.js';
export type { DateGrammar } from './date-parser.js';
export { extractInlineTags } from './inline-tag-parser.js';
export type { InlineTags } from './inline-tag-parser.js';
