/**
 * Core types for Request Wall
 * Focus: deciding whether a request body may reach application logic
 */

// ============================================
// Validation
// ============================================

export type RejectionKind = 'sql_injection_suspected' | 'xss_suspected';

/** Raw request body as the transport hands it over */
export type RequestBody = string | Uint8Array | undefined;

export type ValidationResult =
  | { verdict: 'accept' }
  | {
      verdict: 'reject';
      kind: RejectionKind;
      /** First substring that triggered the rule */
      match: string;
    };

export interface InspectionRule {
  kind: RejectionKind;
  description: string;
  /** Must not carry the `g` or `y` flag: rules are reused across requests */
  pattern: RegExp;
}

export interface RequestValidator {
  validate(body: RequestBody): ValidationResult;
}

// ============================================
// Server
// ============================================

export interface ServerConfig {
  port: number;
  host: string;
  /** Status sent for a rejected request. 500 matches the legacy fault path. */
  rejectionStatus: number;
  /** Maximum body size, in any form the raw body parser accepts. Unlimited by default. */
  bodyLimit: string | number;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 5000,
  host: '127.0.0.1',
  rejectionStatus: 500,
  bodyLimit: Infinity,
};
