/**
 * Feedgate — Error Types
 */

import type { ItemStatus } from '../types';

/**
 * A write collided with the unique canonical-URL constraint.
 * Treated by ingestion as a lost race, not a failure.
 */
export class DuplicateItemError extends Error {
  readonly canonicalUrl: string;

  constructor(canonicalUrl: string) {
    super(`Item already exists for ${canonicalUrl}`);
    this.name = 'DuplicateItemError';
    this.canonicalUrl = canonicalUrl;
  }
}

export class InvalidTransitionError extends Error {
  readonly from: ItemStatus;
  readonly to: ItemStatus;

  constructor(from: ItemStatus, to: ItemStatus) {
    super(`Invalid status transition: ${from} → ${to}`);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * The model answered, but not with something we can use.
 * Never retried.
 */
export class AnalyzerResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AnalyzerResponseError';
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
