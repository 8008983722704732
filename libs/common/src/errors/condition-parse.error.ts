import { ListingWatchError } from './listing-watch.error';

export class ConditionParseError extends ListingWatchError {
  public constructor(
    public readonly condition: string,
    reason: string,
  ) {
    super(`Cannot parse condition "${condition}": ${reason}`, { condition });
  }
}
