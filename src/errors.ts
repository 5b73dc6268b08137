export type DirectiveLocation = {
  source: string;
  argument: string;
};

export class QuizError extends Error {
  directive?: DirectiveLocation;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'QuizError';
  }

  // Annotates the error with the directive that triggered it
  locate(directive: DirectiveLocation) {
    this.directive = directive;
    this.message = `${directive.source}: {{#quiz ${directive.argument}}}: ${this.message}`;

    return this;
  }
}

export class IoError extends QuizError {
  constructor(
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(`Unable to read quiz definition ${path}`, options);
    this.name = 'IoError';
  }
}

export class FormatError extends QuizError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid quiz definition ${path}: ${reason}`, options);
    this.name = 'FormatError';
  }
}

export class EncodeError extends QuizError {
  constructor(
    public readonly keyPath: string,
    public readonly reason: string,
  ) {
    super(`Cannot encode ${keyPath || 'value'}: ${reason}`);
    this.name = 'EncodeError';
  }
}

export class ConfigError extends QuizError {
  constructor(
    public readonly issues: string[],
    options?: ErrorOptions,
  ) {
    super(`Invalid quiz preprocessor configuration: ${issues.join('; ')}`, options);
    this.name = 'ConfigError';
  }
}

export class ProtocolError extends QuizError {
  constructor(reason: string, options?: ErrorOptions) {
    super(`Malformed preprocessor input: ${reason}`, options);
    this.name = 'ProtocolError';
  }
}
