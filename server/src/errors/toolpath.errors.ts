/**
 * Fatal errors raised by the compiler, the merge step and the API input readers
 */

export class ConfigurationError extends Error {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super(`Invalid ${parameter}: ${message}`);
    this.name = 'ConfigurationError';
    this.parameter = parameter;
  }
}

export class MergeError extends Error {
  readonly parameter?: string;

  constructor(message: string, parameter?: string) {
    super(message);
    this.name = 'MergeError';
    this.parameter = parameter;
  }
}

export class InvalidDrawingError extends Error {
  readonly location: string;

  constructor(location: string, message: string) {
    super(`${location}: ${message}`);
    this.name = 'InvalidDrawingError';
    this.location = location;
  }
}

export class CombineJobError extends Error {
  readonly layer: string;

  constructor(layer: string, message: string) {
    super(message);
    this.name = 'CombineJobError';
    this.layer = layer;
  }
}
