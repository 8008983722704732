import { ListingWatchError } from './listing-watch.error';

/** A raw record is not shaped like anything the adapter can read. */
export class MalformedRecordError extends ListingWatchError {}

/** A captured page holds no records container at all. */
export class MalformedBatchError extends ListingWatchError {}
