export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class UpstreamError extends Error {
  code = 'UPSTREAM_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'UpstreamError';
  }
}

export class UnauthorizedError extends Error {
  code = 'UNAUTHORIZED';
  constructor(message = 'Unauthorized', public details?: unknown) {
    super(message);
    this.name = 'UnauthorizedError';
  }
}
