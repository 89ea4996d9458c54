import { describe, it, expect } from '@jest/globals';
import { CsvParser } from '../CsvParser';
import { JsonParser } from '../JsonParser';
import { MultiFormatParser } from '../MultiFormatParser';
import { FileFormat } from '../../types';
import { FormatError } from '../../utils/errors';
import { collect, makeScanned } from '../../__tests__/helpers/fixtures';

describe('CsvParser', () => {
  it('should parse rows with a sniffed delimiter and quoted values', async () => {
    const scanned = makeScanned(
      'incidents.csv',
      'date;operator;fatalities\n2020-01-05;Acme Air;3\n2020-02-01;"Beta; Ltd";\n'
    );
    const parser = new CsvParser(scanned.file);

    const rows = await collect(parser.parse(scanned.content));

    expect(rows).toEqual([
      { date: '2020-01-05', operator: 'Acme Air', fatalities: '3' },
      { date: '2020-02-01', operator: 'Beta; Ltd' }
    ]);
  });

  it('should strip a byte order mark and trim header names', async () => {
    const scanned = makeScanned('bom.csv', '\uFEFF Date , Operator \n2020-01-05,Acme Air\n');

    const rows = await collect(new CsvParser(scanned.file).parse(scanned.content));

    expect(rows).toEqual([{ Date: '2020-01-05', Operator: 'Acme Air' }]);
  });
});

describe('JsonParser', () => {
  it('should parse a top-level array and stringify values', async () => {
    const scanned = makeScanned(
      'incidents.json',
      JSON.stringify([
        { date: '2020-01-05', fatalities: 3, meta: { source: 'x' }, note: null, empty: '' },
        5
      ]),
      FileFormat.JSON
    );

    const rows = await collect(new JsonParser(scanned.file).parse(scanned.content));

    expect(rows).toEqual([{ date: '2020-01-05', fatalities: '3', meta: '{"source":"x"}' }, {}]);
  });

  it('should keep empty and all-null objects as empty rows', async () => {
    const scanned = makeScanned(
      'sparse.json',
      JSON.stringify([{ date: null, operator: null }, {}, { operator: 'Acme Air' }]),
      FileFormat.JSON
    );

    const rows = await collect(new JsonParser(scanned.file).parse(scanned.content));

    expect(rows).toEqual([{}, {}, { operator: 'Acme Air' }]);
  });

  it('should unwrap an object holding one array of records', async () => {
    const scanned = makeScanned(
      'wrapped.json',
      JSON.stringify({ exported: '2021', records: [{ operator: 'Acme Air' }, { operator: 'Beta' }] }),
      FileFormat.JSON
    );

    const rows = await collect(new JsonParser(scanned.file).parse(scanned.content));

    expect(rows).toEqual([{ operator: 'Acme Air' }, { operator: 'Beta' }]);
  });

  it('should treat an object with scalar arrays as a single record', async () => {
    const scanned = makeScanned(
      'single.json',
      JSON.stringify({ operator: 'Acme Air', tags: ['a', 'b'] }),
      FileFormat.JSON
    );

    const rows = await collect(new JsonParser(scanned.file).parse(scanned.content));

    expect(rows).toEqual([{ operator: 'Acme Air', tags: '["a","b"]' }]);
  });

  it('should read newline-delimited JSON', async () => {
    const scanned = makeScanned('lines.ndjson', '{"operator":"A"}\n{"operator":"B"}\n', FileFormat.JSON);

    const rows = await collect(new JsonParser(scanned.file).parse(scanned.content));

    expect(rows).toEqual([{ operator: 'A' }, { operator: 'B' }]);
  });

  it('should raise FormatError for malformed or scalar documents', async () => {
    const broken = makeScanned('broken.json', '{"operator":', FileFormat.JSON);
    const scalar = makeScanned('scalar.json', '42', FileFormat.JSON);

    await expect(collect(new JsonParser(broken.file).parse(broken.content))).rejects.toBeInstanceOf(FormatError);
    await expect(collect(new JsonParser(scalar.file).parse(scalar.content))).rejects.toBeInstanceOf(FormatError);
  });
});

describe('MultiFormatParser', () => {
  it('should pick the parser for the detected format', () => {
    expect(MultiFormatParser.createParser(makeScanned('a.csv', 'x,y'))).toBeInstanceOf(CsvParser);
    expect(MultiFormatParser.createParser(makeScanned('a.json', '[]', FileFormat.JSON))).toBeInstanceOf(JsonParser);
  });

  it('should parse rows directly from a scanned file', async () => {
    const rows = await collect(MultiFormatParser.parseRows(makeScanned('a.csv', 'x,y\n1,2\n')));
    expect(rows).toEqual([{ x: '1', y: '2' }]);
  });
});
