import { describe, expect, it } from 'vitest';
import { FireDataParseError } from './errors';
import { parseFireData } from './fireData';

const SAMPLE = [
  '2008',
  'Butte,47647,Lightning,117',
  'Mariposa,34091,Other,133',
  'Riverside,30305,Structure,245',
  'Shasta,27936,Lightning,12',
  'Butte,23344,Arson,351',
  '6255,1593690',
  '',
  '2009',
  'Kern,1000,Equipment,0',
  'Los Angeles,160577,Arson,209',
  'Monterey,8000,Lightning,4',
  'Santa Barbara,8733,Equipment,80',
  'Inyo,8000,Lightning,1',
  '9159,405585',
].join('\n');

describe('parseFireData', () => {
  it('reads one season per year block', () => {
    const seasons = parseFireData(SAMPLE);

    expect([...seasons.keys()]).toEqual([2008, 2009]);
    const first = seasons.get(2008);
    expect(first?.fireCount).toBe(6255);
    expect(first?.acreage).toBe(1593690);
    expect(first?.topFive[0]).toEqual({
      year: 2008,
      county: 'Butte',
      acreage: 47647,
      cause: 'Lightning',
      structuresDestroyed: 117,
    });
  });

  it('orders each top five by descending acreage, keeping ties in input order', () => {
    const second = parseFireData(SAMPLE).get(2009);

    expect(second?.topFive.map(f => f.county)).toEqual(['Los Angeles', 'Santa Barbara', 'Monterey', 'Inyo', 'Kern']);
    for (const season of parseFireData(SAMPLE).values()) {
      expect(season.topFive).toHaveLength(5);
      const acreages = season.topFive.map(f => f.acreage);
      expect(acreages).toEqual([...acreages].sort((a, b) => b - a));
    }
  });

  it('accepts Windows line endings and padded fields', () => {
    const text = SAMPLE.split('\n').slice(0, 7).map(line => line.replace(/,/g, ', ')).join('\r\n');

    const seasons = parseFireData(text);

    expect(seasons.get(2008)?.topFive[1].county).toBe('Mariposa');
  });

  it('rejects a non-numeric year', () => {
    expect(() => parseFireData('Twenty')).toThrow(FireDataParseError);
  });

  it('reports the line of a fire with the wrong field count', () => {
    const text = ['2008', 'Butte,47647,Lightning'].join('\n');

    expect(() => parseFireData(text)).toThrow('Line 2: Expected 4 fields for a fire, got 3');
  });

  it('rejects a season that does not have five fires', () => {
    const text = ['2008', 'Butte,47647,Lightning,117', '6255,1593690'].join('\n');

    expect(() => parseFireData(text)).toThrow('Line 3: Season 2008 has 1 fires, expected 5');
  });

  it('rejects data before the first year', () => {
    expect(() => parseFireData('Butte,47647,Lightning,117')).toThrow(FireDataParseError);
  });

  it('rejects non-numeric acreage', () => {
    const text = ['2008', 'Butte,lots,Lightning,117'].join('\n');

    expect(() => parseFireData(text)).toThrow('Line 2: Expected a positive integer acreage, got "lots"');
  });

  it('rejects a season cut short by the next year line', () => {
    const text = ['2008', 'Butte,47647,Lightning,117', ...SAMPLE.split('\n').slice(8)].join('\n');

    expect(() => parseFireData(text)).toThrow('Line 3: Season 2008 has no fire_count,acreage line');
  });

  it('rejects a last season with no totals line', () => {
    const text = SAMPLE.split('\n').slice(0, 14).join('\n');

    expect(() => parseFireData(text)).toThrow('Line 14: Season 2009 has no fire_count,acreage line');
  });

  it('rejects fire lines after a season has closed', () => {
    const text = [...SAMPLE.split('\n').slice(0, 7), 'Kern,1000,Equipment,0'].join('\n');

    expect(() => parseFireData(text)).toThrow('Line 8: Data appears outside a season');
  });

  it('rejects negative fire acreage and structure counts', () => {
    expect(() => parseFireData(['2008', 'Butte,-5,Arson,0'].join('\n')))
      .toThrow('Line 2: Expected a positive integer acreage, got "-5"');
    expect(() => parseFireData(['2008', 'Butte,5,Arson,-1'].join('\n')))
      .toThrow('Line 2: Expected a non-negative integer structure count, got "-1"');
  });

  it('rejects season totals that are not positive', () => {
    const fires = SAMPLE.split('\n').slice(0, 6);

    expect(() => parseFireData([...fires, '0,1593690'].join('\n')))
      .toThrow('Line 7: Expected a positive integer fire count, got "0"');
    expect(() => parseFireData([...fires, '6255,-200'].join('\n')))
      .toThrow('Line 7: Expected a positive integer acreage, got "-200"');
  });
});
