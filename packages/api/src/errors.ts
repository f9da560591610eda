export class ConfigError extends Error {
  readonly key?: string;

  constructor(message: string, key?: string) {
    super(message);
    this.name = 'ConfigError';
    this.key = key;
  }
}

/** Rejected input at an HTTP or MQTT boundary. Carries a 400 for the Fastify error handler. */
export class MalformedInputError extends Error {
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = 'MalformedInputError';
  }
}
