import { Logger } from '@nestjs/common';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseFilterFile, parseHighlightFile, ReportCriteriaLoader } from './report-criteria.loader';

describe('parseFilterFile', () => {
  it('splits on lines and commas and drops comments', () => {
    const conditions = parseFilterFile('# budget\nprice <= 200000, n_rooms >= 2\n\nactive == true # only live\n');

    expect(conditions.map((condition) => condition.source)).toEqual([
      'price <= 200000',
      'n_rooms >= 2',
      'active == true',
    ]);
  });
});

describe('parseHighlightFile', () => {
  it('reads one address per JSON line', () => {
    const criteria = parseHighlightFile(
      [
        '{"city": "Tallinn", "street": "Tartu mnt", "house_number": 16}',
        '',
        '{"street": "Kopli", "house_number": ["2", "4a"]}',
        '{"street": "Vana", "city": ""}',
      ].join('\n'),
    );

    expect(criteria).toEqual([
      { city: 'Tallinn', street: 'Tartu mnt', houseNumbers: ['16'] },
      { city: undefined, street: 'Kopli', houseNumbers: ['2', '4a'] },
      { city: undefined, street: 'Vana', houseNumbers: [] },
    ]);
  });

  it('rejects lines that are not JSON', () => {
    expect(() => parseHighlightFile('not json')).toThrow('Highlight line 1 is not JSON');
  });

  it('rejects entries without a street', () => {
    expect(() => parseHighlightFile('\n{"city": "Tallinn"}')).toThrow(
      'Highlight line 2 needs a street and an optional house_number',
    );
  });
});

describe('ReportCriteriaLoader', () => {
  let root: string;

  const createLoader = () =>
    new ReportCriteriaLoader({
      filtersFile: join(root, 'filters.txt'),
      highlightsFile: join(root, 'highlights.jsonl'),
      addressMatchThreshold: 0.88,
      listingsPerEmail: 50,
      timeZone: 'Europe/Tallinn',
    });

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'listing-watch-criteria-'));
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it('loads nothing when the files are missing', async () => {
    const loader = createLoader();

    expect(await loader.loadConditions()).toEqual([]);
    expect(await loader.loadHighlights()).toEqual([]);
  });

  it('loads both files', async () => {
    await writeFile(join(root, 'filters.txt'), 'price <= 100000\n');
    await writeFile(join(root, 'highlights.jsonl'), '{"street": "Kopli"}\n');
    const loader = createLoader();

    expect((await loader.loadConditions()).map((condition) => condition.field)).toEqual(['price']);
    expect(await loader.loadHighlights()).toEqual([{ city: undefined, street: 'Kopli', houseNumbers: [] }]);
  });
});
