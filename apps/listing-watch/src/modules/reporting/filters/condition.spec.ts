import { ConditionParseError } from '@libs/common';
import { Listing } from '@libs/models';
import { evaluateCondition, matchesAll, parseCondition } from './condition';

describe('parseCondition', () => {
  it('parses a numeric comparison', () => {
    expect(parseCondition('price <= 200000')).toEqual({
      field: 'price',
      comparator: '<=',
      value: 200000,
      source: 'price <= 200000',
    });
  });

  it('accepts column names and missing spaces', () => {
    const condition = parseCondition('n_rooms>=2');

    expect(condition.field).toBe('nRooms');
    expect(condition.comparator).toBe('>=');
    expect(condition.value).toBe(2);
  });

  it('strips quotes and stray dots around the value only', () => {
    expect(parseCondition("city == 'Tallinn'").value).toBe('Tallinn');
    expect(parseCondition('areaM2 > 0.5').value).toBe(0.5);
    expect(parseCondition('price < 50.').value).toBe(50);
  });

  it('reads flags as booleans', () => {
    expect(parseCondition('active == 1').value).toBe(true);
    expect(parseCondition('reported != false').value).toBe(false);
  });

  it('rejects ordering comparisons on flags', () => {
    expect(() => parseCondition('active < true')).toThrow(
      'Cannot parse condition "active < true": active can only be compared with == or !=',
    );
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseCondition('price <= cheap')).toThrow('price takes a number, got "cheap"');
  });

  it('rejects unknown fields', () => {
    expect(() => parseCondition('colour == red')).toThrow(ConditionParseError);
    expect(() => parseCondition('colour == red')).toThrow('unknown field "colour"');
  });

  it('rejects text without a comparator', () => {
    expect(() => parseCondition('price')).toThrow('expected "<field> <comparator> <value>"');
  });
});

describe('evaluateCondition', () => {
  const listing = Listing.create({ active: true, city: 'Tallinn', street: 'Kopli', price: 150000 });

  it('compares numbers numerically', () => {
    expect(evaluateCondition(parseCondition('price <= 200000'), listing)).toBe(true);
    expect(evaluateCondition(parseCondition('price > 200000'), listing)).toBe(false);
  });

  it('compares text lexically', () => {
    expect(evaluateCondition(parseCondition('city == Tallinn'), listing)).toBe(true);
    expect(evaluateCondition(parseCondition('street < M'), listing)).toBe(true);
  });

  it('compares flags for equality', () => {
    expect(evaluateCondition(parseCondition('active == true'), listing)).toBe(true);
    expect(evaluateCondition(parseCondition('active != true'), listing)).toBe(false);
  });

  it('passes every listing through an empty filter list', () => {
    expect(matchesAll([], listing)).toBe(true);
  });
});
