export {
  isSubsequenceMatch,
  isSubstringMatch,
  nameMatcherFor,
  matchNames,
} from './name-matcher.js';
export type { NameMatchOptions } from './name-matcher.js';
export { classifyMatches } from './match-classifier.js';
