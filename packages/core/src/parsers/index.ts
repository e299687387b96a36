export { formatDate, isIsoDate } from './date-parser.js';
export { compilePattern, matchesPattern } from './pattern.js';
