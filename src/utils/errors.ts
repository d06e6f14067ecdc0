export class EmotionClassifierError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EmotionClassifierError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class EmptyInputError extends EmotionClassifierError {
  constructor(message = 'Cannot classify a day without readings', options?: ErrorOptions) {
    super(message, 'EMPTY_INPUT', options);
    this.name = 'EmptyInputError';
  }
}

export class InvalidValenceError extends EmotionClassifierError {
  public readonly valence: unknown;

  constructor(valence: unknown, message: string, options?: ErrorOptions) {
    super(message, 'INVALID_VALENCE', options);
    this.name = 'InvalidValenceError';
    this.valence = valence;
  }
}

export class InvalidReadingError extends EmotionClassifierError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INVALID_READING', options);
    this.name = 'InvalidReadingError';
  }
}

export class UnknownStrategyError extends EmotionClassifierError {
  constructor(strategy: string, options?: ErrorOptions) {
    super(`Unknown classification strategy: ${strategy}`, 'UNKNOWN_STRATEGY', options);
    this.name = 'UnknownStrategyError';
  }
}

export class ConfigError extends EmotionClassifierError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
