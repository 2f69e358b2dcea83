/**
 * Error taxonomy for dataset generation.
 *
 * - ConfigurationError: fatal, raised before any record is emitted
 * - ExternalProviderFailure: raised by providers, always recovered at the call site
 * - IntegrityViolation: fatal, a parent was referenced before it was materialized
 */

export class GenerationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

export class ConfigurationError extends GenerationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export class InvalidDistribution extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidDistribution';
  }
}

export type ProviderKind = 'content' | 'catalog' | 'profile';

export class ExternalProviderFailure extends GenerationError {
  readonly provider: ProviderKind;

  constructor(provider: ProviderKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExternalProviderFailure';
    this.provider = provider;
  }
}

export class IntegrityViolation extends GenerationError {
  constructor(message: string) {
    super(message);
    this.name = 'IntegrityViolation';
  }
}
