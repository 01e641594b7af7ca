import {timingSafeEqual} from 'node:crypto';
import {inspect} from 'node:util';

export class SecretKeyReleasedError extends Error {
  constructor() {
    super('Secret key has been released');
    this.name = 'SecretKeyReleasedError';
  }
}

/**
 * Owned key material retrieved from a KME.
 *
 * The bytes live in a private buffer that is zero-filled on release. Every
 * accessor throws {@link SecretKeyReleasedError} once the key is released.
 */
export class SecretKey {
  private bytes: Buffer;
  private released = false;

  private constructor(bytes: Buffer) {
    this.bytes = bytes;
  }

  /** Copies `bytes` into a new key; the caller keeps ownership of its input. */
  static fromBytes(bytes: Uint8Array): SecretKey {
    return new SecretKey(Buffer.from(bytes));
  }

  /** Takes ownership of `buffer` without copying it. */
  static adopt(buffer: Buffer): SecretKey {
    return new SecretKey(buffer);
  }

  get byteLength(): number {
    return this.live().length;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Borrow the key bytes for the duration of `operation`.
   * The view must not escape the callback.
   */
  use<T>(operation: (bytes: Uint8Array) => T): T {
    return operation(this.live());
  }

  /** A copy of the key bytes; the caller owns and must wipe it. */
  export(): Buffer {
    return Buffer.from(this.live());
  }

  equals(other: SecretKey): boolean {
    const left = this.live();
    const right = other.live();
    return left.length === right.length && timingSafeEqual(left, right);
  }

  release(): void {
    if (this.released) {
      return;
    }
    this.bytes.fill(0);
    this.bytes = Buffer.alloc(0);
    this.released = true;
  }

  toJSON(): string {
    return '[REDACTED]';
  }

  toString(): string {
    return '[REDACTED]';
  }

  [inspect.custom](): string {
    return `SecretKey(${this.released ? 'released' : '[REDACTED]'})`;
  }

  private live(): Buffer {
    if (this.released) {
      throw new SecretKeyReleasedError();
    }
    return this.bytes;
  }
}
