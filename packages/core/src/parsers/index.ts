export { parseDate } from './date-parser.js';
export { parseRecurrence } from './recurrence-parser.js';
