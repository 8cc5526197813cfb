export type SizerErrorCode = 'CONFIG' | 'INPUT_SHAPE' | 'INPUT_FILE';

export class SizerError extends Error {
  readonly code: SizerErrorCode;

  constructor(code: SizerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Limits or environment configuration is missing or not usable. */
export class ConfigError extends SizerError {
  readonly keys: string[];

  constructor(message: string, keys: string[] = []) {
    super('CONFIG', message);
    this.keys = keys;
  }
}

/** Trade plans, equity or preferences do not have the expected shape. */
export class InputShapeError extends SizerError {
  constructor(message: string) {
    super('INPUT_SHAPE', message);
  }
}

export class InputFileError extends SizerError {
  readonly path: string;

  constructor(path: string, message: string) {
    super('INPUT_FILE', message);
    this.path = path;
  }
}
