import type { ParticipantId } from './allocation.js';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class AllocationLookupError extends Error {
  readonly participant: ParticipantId;

  constructor(message: string, participant: ParticipantId) {
    super(message);
    this.name = 'AllocationLookupError';
    this.participant = participant;
  }
}

export interface IntegrityViolations {
  missing: ParticipantId[];
  duplicated: ParticipantId[];
  unknown: ParticipantId[];
}

export class DataIntegrityError extends Error {
  readonly missing: ParticipantId[];
  readonly duplicated: ParticipantId[];
  readonly unknown: ParticipantId[];

  constructor(message: string, violations: IntegrityViolations) {
    super(message);
    this.name = 'DataIntegrityError';
    this.missing = violations.missing;
    this.duplicated = violations.duplicated;
    this.unknown = violations.unknown;
  }
}
