import { v4 as uuidv4 } from 'uuid';

import { MalformedIdentifierError } from '../errors.js';

/** Canonical lowercase, hyphenated UUID: 8-4-4-4-12 hex digits. */
const ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/**
 * Opaque identifier binding a project to its secrets directory.
 *
 * The text form is used verbatim as a directory name, so only canonical
 * lowercase UUIDs are accepted. Instances are frozen.
 * Serializes transparently as a plain string in JSON.
 */
export class SecretsId {
  private readonly inner: string;

  private constructor(value: string) {
    this.inner = value;
    Object.freeze(this);
  }

  /** Create a new random identifier (UUID v4). */
  static generate(): SecretsId {
    return new SecretsId(uuidv4());
  }

  /**
   * Parse the text form of an identifier.
   * Throws MalformedIdentifierError unless the value is a canonical identifier.
   */
  static parse(value: string): SecretsId {
    if (!SecretsId.isValid(value)) {
      throw new MalformedIdentifierError(value);
    }
    return new SecretsId(value);
  }

  /** Returns true if the string is a canonical identifier. */
  static isValid(value: string): boolean {
    return ID_PATTERN.test(value);
  }

  /** The underlying string value. */
  asStr(): string {
    return this.inner;
  }

  equals(other: SecretsId): boolean {
    return this.inner === other.inner;
  }

  toString(): string {
    return this.inner;
  }

  toJSON(): string {
    return this.inner;
  }
}
