// Failure kinds raised by ciphers and analysis functions

export type CipherErrorKind = 'InvalidKey' | 'InvalidParameter' | 'DomainError';

export class CipherError extends Error {
  readonly kind: CipherErrorKind;

  constructor(kind: CipherErrorKind, message: string) {
    super(message);
    this.name = 'CipherError';
    this.kind = kind;
  }
}

export class InvalidKeyError extends CipherError {
  constructor(message: string) {
    super('InvalidKey', message);
    this.name = 'InvalidKeyError';
  }
}

export class InvalidParameterError extends CipherError {
  constructor(message: string) {
    super('InvalidParameter', message);
    this.name = 'InvalidParameterError';
  }
}

export class DomainError extends CipherError {
  constructor(message: string) {
    super('DomainError', message);
    this.name = 'DomainError';
  }
}

export function isCipherError(error: unknown): error is CipherError {
  return error instanceof CipherError;
}
