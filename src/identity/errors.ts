export class ClientIdentityError extends Error {
  constructor(
    readonly code: 'invalid_component' | 'invalid_configuration',
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// app/instance component failed the alphabet or emptiness check
export class InvalidComponentError extends ClientIdentityError {
  constructor(
    readonly field: string,
    reason: string,
  ) {
    super('invalid_component', `${field} is invalid: ${reason}`);
  }
}

export class InvalidConfigurationError extends ClientIdentityError {
  constructor(message: string) {
    super('invalid_configuration', message);
  }
}
