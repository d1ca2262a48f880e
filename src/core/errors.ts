// Error taxonomy shared by every layer. Callers branch on the class, not the message.

export class RecommendationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Bad input from the user: empty intent, missing book selection, unreadable saved file.
export class ValidationError extends RecommendationError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
  }
}

// The backend could not be reached or answered with an API error.
export class BackendError extends RecommendationError {}

// The backend answered, but its output does not fit the expected shape.
export class ResponseValidationError extends RecommendationError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export class ConfigurationError extends RecommendationError {}
