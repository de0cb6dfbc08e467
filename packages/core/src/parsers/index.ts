export { parseDate, formatDate, addDays, isIsoDate, todayString } from './date-parser.js';
export { parseTagList } from './tag-filter-parser.js';
