/**
 * Inspection Rules - the fixed pattern table the validator runs
 * Order matters: the first matching rule decides the rejection kind.
 */

import type { InspectionRule } from '../types/index.js';

export const INSPECTION_RULES: readonly InspectionRule[] = [
  {
    kind: 'sql_injection_suspected',
    description: 'SQL keyword or comment/statement separator anywhere in the body',
    // Unicode case folding, so "ſelect" matches SELECT; dotless and dotted I have no simple fold
    pattern: /(SELECT|[Iıİ]NSERT|UPDATE|DELETE|DROP|;|--|#)/iu,
  },
  {
    kind: 'xss_suspected',
    description: 'HTML tag shaped token: "<", one or more non-">" characters, ">"',
    pattern: /<[^>]+>/,
  },
];
