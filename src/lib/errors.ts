/**
 * Error types for a pipeline run. Every one of them ends the run.
 */

export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineError';
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigNotFoundError extends PipelineError {
  constructor(public readonly configPath: string) {
    super(`Config file ${configPath} not found`);
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigMalformedError extends PipelineError {
  constructor(public readonly configPath: string, detail: string) {
    super(`Invalid JSON in config file ${configPath}: ${detail}`);
    this.name = 'ConfigMalformedError';
  }
}

export class ConfigIncompleteError extends PipelineError {
  constructor(public readonly configPath: string, section: string) {
    super(`'${section}' section not found in config file ${configPath}`);
    this.name = 'ConfigIncompleteError';
  }
}

export class PipelineNotFoundError extends PipelineError {
  constructor(public readonly pipeline: string) {
    super(`Pipeline '${pipeline}' not found in config`);
    this.name = 'PipelineNotFoundError';
  }
}

export class PipelineConfigError extends PipelineError {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineConfigError';
  }
}

export class ConnectionError extends PipelineError {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectionError';
  }
}

export class TransferError extends PipelineError {
  constructor(message: string) {
    super(message);
    this.name = 'TransferError';
  }
}

export class CommandError extends PipelineError {
  constructor(
    public readonly exitCode: number,
    public readonly stdout: string,
    public readonly stderr: string
  ) {
    super(`Remote command failed with exit code ${exitCode}`);
    this.name = 'CommandError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node errno code of an unknown thrown value, if it carries one.
 */
export function errorCode(error: unknown): string | number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'string' || typeof code === 'number') {
      return code;
    }
  }
  return undefined;
}
