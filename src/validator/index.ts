/**
 * Validator module exports
 */

export { INSPECTION_RULES } from './rules.js';
export { PatternValidator, createRequestValidator, validateBody, decodeBody } from './validator.js';
