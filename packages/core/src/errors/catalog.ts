/**
 * Typed error catalog for index, resolution and allocation failures.
 *
 * Every error carries the offending code or path in `details` so callers can
 * show the user something to act on.
 */

export class JdexError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = this.constructor.name
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    }
  }
}

// Index document errors

export class IndexMissingError extends JdexError {
  constructor(details?: Record<string, unknown>) {
    super('INDEX_MISSING', 'Index not found, rebuild required', details)
  }
}

export class IndexCorruptError extends JdexError {
  constructor(details?: Record<string, unknown>) {
    super('INDEX_CORRUPT', 'Index is corrupt, rebuild required', details)
  }
}

// Lookup errors

export class NotFoundError extends JdexError {
  constructor(details?: Record<string, unknown>) {
    super('NOT_FOUND', 'No such item', details)
  }
}

export class InvalidCodeError extends JdexError {
  constructor(details?: Record<string, unknown>) {
    super('INVALID_CODE', 'Not a valid Johnny Decimal code', details)
  }
}

// Allocation errors

export class CategoryFullError extends JdexError {
  constructor(details?: Record<string, unknown>) {
    super('CATEGORY_FULL', 'Category has no free slots', details)
  }
}

export class SlotTakenError extends JdexError {
  constructor(details?: Record<string, unknown>) {
    super('SLOT_TAKEN', 'Slot is already taken', details)
  }
}

export class InvalidNameError extends JdexError {
  constructor(details?: Record<string, unknown>) {
    super('INVALID_NAME', 'Invalid folder name', details)
  }
}

// Scan errors (reported, never thrown out of a rebuild)

export class PermissionDeniedError extends JdexError {
  constructor(details?: Record<string, unknown>) {
    super('PERMISSION_DENIED', 'Permission denied', details)
  }
}

/** A missing index only means the cache has not been built yet. */
export function isRecoverable(err: unknown): boolean {
  return err instanceof IndexMissingError
}
