export type FieldKind = 'text' | 'integer' | 'real' | 'flag';

export type SqlStorageClass = 'INTEGER' | 'REAL' | 'TEXT' | 'BLOB';

interface FieldKindValue {
  text: string;
  integer: number;
  real: number;
  flag: boolean;
}

/**
 * Listing fields in column order, with the kind that fixes each field's type.
 */
export const LISTING_FIELDS = {
  id: 'text',
  portal: 'text',
  active: 'flag',
  reported: 'flag',
  url: 'text',
  imageUrl: 'text',
  address: 'text',
  city: 'text',
  street: 'text',
  houseNumber: 'text',
  apartmentNumber: 'text',
  nRooms: 'integer',
  areaM2: 'real',
  price: 'real',
  constructionYear: 'integer',
  dateListed: 'real',
  dateScraped: 'real',
  dateUnlisted: 'real',
} as const satisfies Record<string, FieldKind>;

export type ListingField = keyof typeof LISTING_FIELDS;

export type FieldOfKind<K extends FieldKind> = {
  [F in ListingField]: (typeof LISTING_FIELDS)[F] extends K ? F : never;
}[ListingField];

export type ListingValues = {
  [F in ListingField]: FieldKindValue[(typeof LISTING_FIELDS)[F]];
};

export const LISTING_FIELD_NAMES: readonly ListingField[] = Object.keys(LISTING_FIELDS).filter(isListingField);

export function isListingField(name: string): name is ListingField {
  return Object.prototype.hasOwnProperty.call(LISTING_FIELDS, name);
}

export function isFieldOfKind<K extends FieldKind>(field: ListingField, kind: K): field is FieldOfKind<K> {
  return LISTING_FIELDS[field] === kind;
}

/** imageUrl -> image_url, areaM2 -> area_m2 */
export function toColumnName(field: ListingField): string {
  return field.replace(/([A-Z])/g, (letter) => `_${letter.toLowerCase()}`);
}

/**
 * Resolves a field from either its property name or its column name.
 */
export function resolveFieldName(name: string): ListingField | undefined {
  if (isListingField(name)) {
    return name;
  }
  return LISTING_FIELD_NAMES.find((field) => toColumnName(field) === name);
}

export function sqlStorageClass(kind: string): SqlStorageClass {
  switch (kind) {
    case 'integer':
    case 'flag':
      return 'INTEGER';
    case 'real':
      return 'REAL';
    case 'text':
      return 'TEXT';
    default:
      return 'BLOB';
  }
}
