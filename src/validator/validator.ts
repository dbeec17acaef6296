/**
 * Request Validator
 * Scans a raw request body against the inspection rules and returns a verdict.
 * Pure: no I/O, no shared mutable state.
 */

import { INSPECTION_RULES } from './rules.js';
import type {
  InspectionRule,
  RequestBody,
  RequestValidator,
  ValidationResult,
} from '../types/index.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode a request body to text. Missing bodies decode to an empty string.
 * Throws a TypeError on malformed UTF-8.
 */
export function decodeBody(body: RequestBody): string {
  if (body === undefined) return '';
  if (typeof body === 'string') return body;
  return utf8.decode(body);
}

// ============================================
// Pattern Validator
// ============================================

export class PatternValidator implements RequestValidator {
  private rules: readonly InspectionRule[];

  constructor(rules: readonly InspectionRule[] = INSPECTION_RULES) {
    for (const rule of rules) {
      if (rule.pattern.global || rule.pattern.sticky) {
        throw new Error(`Inspection rule for ${rule.kind} must not use the g or y flag`);
      }
    }
    this.rules = rules;
  }

  validate(body: RequestBody): ValidationResult {
    const text = decodeBody(body);
    if (text.length === 0) {
      return { verdict: 'accept' };
    }

    for (const rule of this.rules) {
      const found = rule.pattern.exec(text);
      if (found) {
        return { verdict: 'reject', kind: rule.kind, match: found[0] };
      }
    }

    return { verdict: 'accept' };
  }

  getRules(): readonly InspectionRule[] {
    return this.rules;
  }
}

// ============================================
// Factory
// ============================================

const defaultValidator = new PatternValidator();

export function createRequestValidator(): RequestValidator {
  return new PatternValidator();
}

export function validateBody(body: RequestBody): ValidationResult {
  return defaultValidator.validate(body);
}
