export class CompileError extends Error {
  override name = 'CompileError';

  constructor(
    message: string,
    public readonly stderr: string = '',
  ) {
    super(stderr ? `${message}\n${stderr}` : message);
  }
}

export class SignatureError extends Error {
  override name = 'SignatureError';
}

export class UnavailableError extends Error {
  override name = 'UnavailableError';
}

export class MismatchError extends Error {
  override name = 'MismatchError';

  constructor(
    public readonly label: string,
    public readonly actual: number,
    public readonly expected: number,
    public readonly tolerance: number,
  ) {
    super(`${label}: result ${actual} differs from reference ${expected} by more than ${tolerance}`);
  }
}
