/**
 * Error hierarchy for frozen collections and builders.
 */

export type ElementRole = 'element' | 'key' | 'value';

export class CollectionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CollectionError';
  }
}

/**
 * Thrown when an element, key or value is null, undefined, or rejected by
 * the collection's type descriptor.
 */
export class InvalidElementError extends CollectionError {
  constructor(
    public readonly role: ElementRole,
    public readonly value: unknown,
    options?: ErrorOptions
  ) {
    super(
      value === null || value === undefined
        ? `null ${role}`
        : `invalid ${role}: ${describe(value)}`,
      options
    );
    this.name = 'InvalidElementError';
  }
}

/**
 * Thrown when a collection or builder is created without a type descriptor.
 */
export class UnspecifiedTypeError extends CollectionError {
  constructor(public readonly role: ElementRole, example: string) {
    super(`explicit ${role} type required, for example "${example}"`);
    this.name = 'UnspecifiedTypeError';
  }
}

export class ArgumentError extends CollectionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ArgumentError';
  }
}

function describe(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'object') {
    return value === null ? 'null' : `[${value.constructor?.name ?? 'object'}]`;
  }
  return String(value);
}
