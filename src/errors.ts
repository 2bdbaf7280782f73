/**
 * Deep-TOON encode/decode errors with line/column or value path.
 */

import type { SourcePosition } from './ast.js';

type ConstructorOptions = { position?: SourcePosition; cause?: unknown };

export class DeepToonError extends Error {
  override readonly name: string = 'DeepToonError';
  readonly position?: SourcePosition;

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    this.position = options?.position;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, DeepToonError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    if (this.position) {
      return `line ${this.position.line}, column ${this.position.column}`;
    }
    return '';
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.message} (${loc})` : this.message;
  }
}

export class DeepToonEncodeError extends DeepToonError {
  override readonly name = 'DeepToonEncodeError';
  /** Path of the offending value, e.g. `$.items[2].price` */
  readonly path: string;

  constructor(message: string, options: ConstructorOptions & { path: string }) {
    super(message, options);
    this.path = options.path;
    Object.setPrototypeOf(this, DeepToonEncodeError.prototype);
  }

  override get location(): string {
    return `at ${this.path}`;
  }
}

export type DecodeErrorKind =
  | 'IndentationError'
  | 'StructuralCountError'
  | 'LiteralError'
  | 'DepthLimitError'
  | 'SyntaxError'
  | 'DuplicateKey';

export class DeepToonDecodeError extends DeepToonError {
  override readonly name = 'DeepToonDecodeError';
  readonly kind: DecodeErrorKind;

  constructor(kind: DecodeErrorKind, message: string, options?: ConstructorOptions) {
    super(message, options);
    this.kind = kind;
    Object.setPrototypeOf(this, DeepToonDecodeError.prototype);
  }
}
