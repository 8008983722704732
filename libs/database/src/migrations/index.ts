import { CreateListings1730000000000 } from './1730000000000-CreateListings';

export const migrations = [CreateListings1730000000000];
