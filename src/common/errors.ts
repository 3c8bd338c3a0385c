export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** The judgment service answered, but not with the JSON we asked for. */
export class MalformedResponseError extends Error {
  constructor(message: string, public readonly response: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

export class PipelineAbortedError extends Error {
  constructor(message = 'Pipeline interrupted') {
    super(message);
    this.name = 'PipelineAbortedError';
  }
}

export class DeliveryError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'DeliveryError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
