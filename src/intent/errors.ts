/**
 * Error types raised by the intent model and its training inputs.
 */

/**
 * Thrown when predict() or persist() is called before fit() or restore().
 */
export class NotTrainedError extends Error {
  constructor(message = 'Intent model is not trained or loaded') {
    super(message);
    this.name = 'NotTrainedError';
  }
}

/**
 * Thrown when a persisted model blob cannot be parsed or fails validation.
 */
export class CorruptModelError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'CorruptModelError';
  }
}

/**
 * Thrown when training data is malformed or too small to stratify.
 *
 * `row` is the 1-based data row (header excluded) when a single row is at
 * fault; `label` is set when a whole class is.
 */
export class DatasetFormatError extends Error {
  constructor(
    message: string,
    public readonly details: { row?: number; label?: string } = {},
  ) {
    super(message);
    this.name = 'DatasetFormatError';
  }
}
