export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class InvalidRepositoryUrlError extends Error {
  constructor(readonly url: string) {
    super(`invalid repository URL: ${url}`);
    this.name = 'InvalidRepositoryUrlError';
  }
}

export class TransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

export class UnexpectedStatusError extends Error {
  constructor(readonly status: number, readonly statusText: string) {
    super(`server error, unexpected status code: ${status} ${statusText}`.trimEnd());
    this.name = 'UnexpectedStatusError';
  }
}

export class ResponseParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResponseParseError';
  }
}
