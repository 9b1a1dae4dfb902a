// pattern: Functional Core

export class SandboxSyntaxError extends Error {
  constructor(
    message: string,
    public line: number,
  ) {
    super(message);
    this.name = 'SandboxSyntaxError';
  }
}

export type SandboxErrorKind =
  | 'NameError'
  | 'TypeError'
  | 'ValueError'
  | 'IndexError'
  | 'KeyError'
  | 'AttributeError'
  | 'ZeroDivisionError'
  | 'RuntimeError';

/**
 * An exception raised by sandboxed code. `message` is what the code agent
 * reports back to the model, so it carries no host stack or path detail.
 */
export class SandboxRuntimeError extends Error {
  constructor(
    public kind: SandboxErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'SandboxRuntimeError';
  }
}
