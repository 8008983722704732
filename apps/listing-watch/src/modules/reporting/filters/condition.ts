import { ConditionParseError } from '@libs/common';
import { LISTING_FIELDS, Listing, ListingField, resolveFieldName } from '@libs/models';

export type OrderComparator = '<' | '<=' | '>' | '>=';
export type Comparator = OrderComparator | '==' | '!=';

export type ConditionValue = string | number | boolean;

/** `price <= 200000` as data */
export interface Condition {
  field: ListingField;
  comparator: Comparator;
  value: ConditionValue;
  source: string;
}

const CONDITION_PATTERN = /^(\w+)\s*(<=|>=|==|!=|<|>)\s*(.+)$/;
const LITERAL_EDGES = /^[\s.'"]+|[\s.'"]+$/g;

function isOrderComparator(comparator: Comparator): comparator is OrderComparator {
  return comparator !== '==' && comparator !== '!=';
}

function parseValue(source: string, field: ListingField, literal: string, comparator: Comparator): ConditionValue {
  const kind = LISTING_FIELDS[field];

  switch (kind) {
    case 'integer':
    case 'real': {
      const value = Number(literal);
      if (literal === '' || !Number.isFinite(value)) {
        throw new ConditionParseError(source, `${field} takes a number, got "${literal}"`);
      }
      return value;
    }
    case 'flag': {
      if (isOrderComparator(comparator)) {
        throw new ConditionParseError(source, `${field} can only be compared with == or !=`);
      }
      if (literal === '1' || literal.toLowerCase() === 'true') {
        return true;
      }
      if (literal === '0' || literal.toLowerCase() === 'false') {
        return false;
      }
      throw new ConditionParseError(source, `${field} takes true or false, got "${literal}"`);
    }
    case 'text':
      return literal;
  }
}

/**
 * Parses `<field> <comparator> <value>`. The field may be given by property
 * (`nRooms`) or column name (`n_rooms`); the value is checked against the
 * field's type.
 */
export function parseCondition(text: string): Condition {
  const source = text.trim();
  const match = CONDITION_PATTERN.exec(source);
  if (!match) {
    throw new ConditionParseError(source, 'expected "<field> <comparator> <value>"');
  }

  const [, name, comparatorText, literal] = match;
  const field = resolveFieldName(name);
  if (!field) {
    throw new ConditionParseError(source, `unknown field "${name}"`);
  }

  const comparator = parseComparator(comparatorText, source);
  const value = parseValue(source, field, literal.replace(LITERAL_EDGES, ''), comparator);

  return { field, comparator, value, source };
}

function parseComparator(text: string, source: string): Comparator {
  switch (text) {
    case '<':
    case '<=':
    case '>':
    case '>=':
    case '==':
    case '!=':
      return text;
    default:
      throw new ConditionParseError(source, `unsupported comparator "${text}"`);
  }
}

function compareOrdered<T extends number | string>(actual: T, comparator: OrderComparator, expected: T): boolean {
  switch (comparator) {
    case '<':
      return actual < expected;
    case '<=':
      return actual <= expected;
    case '>':
      return actual > expected;
    case '>=':
      return actual >= expected;
  }
}

export function evaluateCondition(condition: Condition, listing: Listing): boolean {
  const actual = listing[condition.field];
  const { comparator, value } = condition;

  if (comparator === '==') {
    return actual === value;
  }
  if (comparator === '!=') {
    return actual !== value;
  }
  if (typeof actual === 'number' && typeof value === 'number') {
    return compareOrdered(actual, comparator, value);
  }
  if (typeof actual === 'string' && typeof value === 'string') {
    return compareOrdered(actual, comparator, value);
  }
  return false;
}

export function matchesAll(conditions: readonly Condition[], listing: Listing): boolean {
  return conditions.every((condition) => evaluateCondition(condition, listing));
}
