import type { CategoryRule } from '../config.js';
import type { DocType } from '../types.js';

export const FALLBACK_DOC_TYPE = 'other';

/** First rule with a keyword contained in the lower-cased file name wins. */
export function categorizeDocument(filename: string, rules: readonly CategoryRule[]): DocType {
  const name = filename.toLowerCase();
  for (const rule of rules) {
    if (rule.keywords.some((k) => name.includes(k.toLowerCase()))) {
      return rule.docType;
    }
  }
  return FALLBACK_DOC_TYPE;
}
