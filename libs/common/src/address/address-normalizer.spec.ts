import { Logger } from '@nestjs/common';
import { combineAddress, normalizeDiacritics, parseFreeTextAddress, slugify } from './address-normalizer';

describe('address normalizer', () => {
  describe('normalizeDiacritics', () => {
    it('lower-cases and transliterates local letters', () => {
      expect(normalizeDiacritics('Põhja-Tallinn Ülemiste Šõ')).toBe('pohja-tallinn ulemiste so');
    });

    it('leaves plain ASCII untouched apart from case', () => {
      expect(normalizeDiacritics('Kopli 64')).toBe('kopli 64');
    });
  });

  describe('slugify', () => {
    it('joins parts with hyphens and replaces whitespace', () => {
      expect(slugify(['Põhja-Tallinn', 'Tallinn', 'Kopli tn'])).toBe('pohja-tallinn-tallinn-kopli-tn');
    });

    it('skips empty parts', () => {
      expect(slugify(['', ' Kesklinn '])).toBe('kesklinn');
    });
  });

  describe('combineAddress', () => {
    it.each([
      ['Main St', '5', '12', 'Main St 5-12'],
      ['Main St', '', '', 'Main St'],
      ['Main St', '5', '', 'Main St 5'],
      ['Main St', '', '12', 'Main St 12'],
      ['', '5', '12', '5-12'],
      ['', '', '', ''],
    ])('combines (%p, %p, %p) into %p', (street, house, apartment, expected) => {
      expect(combineAddress(street, house, apartment)).toBe(expected);
    });
  });

  describe('parseFreeTextAddress', () => {
    let warn: jest.SpyInstance;

    beforeEach(() => {
      warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
      warn.mockRestore();
    });

    it('splits city, street, house and apartment', () => {
      expect(parseFreeTextAddress('Harju, Tallinn, Northern District, Kopli tn 64-5')).toEqual({
        city: 'Tallinn',
        street: 'Kopli',
        houseNumber: '64',
        apartmentNumber: '5',
      });
      expect(warn).not.toHaveBeenCalled();
    });

    it('keeps a comma after a digit inside the street segment', () => {
      expect(parseFreeTextAddress('Harju, Tallinn, Northern District, Kalaranna 21, 23-49')).toEqual({
        city: 'Tallinn',
        street: 'Kalaranna',
        houseNumber: '21/23',
        apartmentNumber: '49',
      });
    });

    it('strips other street-type abbreviations', () => {
      expect(parseFreeTextAddress('Harjumaa, Tallinn, Kesklinn, Tartu mnt 16')).toEqual({
        city: 'Tallinn',
        street: 'Tartu',
        houseNumber: '16',
        apartmentNumber: '',
      });
    });

    it('accepts multi-word city names', () => {
      expect(parseFreeTextAddress('Harju maakond, Saue vald, Laagri, Pärnasalu 31')).toEqual({
        city: 'Saue vald',
        street: 'Pärnasalu',
        houseNumber: '31',
        apartmentNumber: '',
      });
      expect(warn).not.toHaveBeenCalled();
    });

    it('returns a partial result and warns when the address is suspect', () => {
      expect(parseFreeTextAddress('Tallinn')).toEqual({
        city: '',
        street: '',
        houseNumber: '',
        apartmentNumber: '',
      });
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });
});
