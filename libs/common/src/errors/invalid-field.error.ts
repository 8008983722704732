import { ListingWatchError } from './listing-watch.error';

/**
 * Assignment of an unknown listing field, or of a value whose shape
 * cannot be coerced to the field's type.
 */
export class InvalidFieldError extends ListingWatchError {
  public constructor(
    public readonly field: string,
    reason: string,
    value?: unknown,
  ) {
    super(`Invalid field "${field}": ${reason}`, { field, value });
  }
}
