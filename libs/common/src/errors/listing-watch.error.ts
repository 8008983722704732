export type ErrorContext = Record<string, unknown>;

export class ListingWatchError extends Error {
  public constructor(
    message: string,
    public readonly context: ErrorContext = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}
