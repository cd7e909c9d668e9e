/**
 * Error types raised by the network simulator
 */

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class NotFoundError extends Error {
  readonly key: string;

  constructor(message: string, key: string) {
    super(message);
    this.name = 'NotFoundError';
    this.key = key;
  }
}
