/**
 * Help Listing Parser Module
 * @module parsers/help
 */

export {
  FLAG_LINE_PATTERN,
  matchFlagLine,
  extractFlagNames,
  countLines,
} from './flag-extractor.js';
