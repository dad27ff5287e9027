import { ColumnDescriptor } from '@trendlens/shared-types';
import {
  DecodeError,
  EmptyResultError,
  PointCountMismatchError,
} from '../errors/trends.errors';
import { ResponseDecoderService, unescapeEmbedded } from './response-decoder.service';

const GUARD = ")]}'";

const column = (keyword: string, label = keyword): ColumnDescriptor => ({
  keyword,
  geo: '',
  timeframe: 'today 3-m',
  label,
});

const widgetPayload = (body: unknown) => `${GUARD},\n${JSON.stringify(body)}`;

const rpcPayload = (rpcId: string, inner: unknown) =>
  `${GUARD}\n\n${JSON.stringify([
    ['wrb.fr', rpcId, inner === null ? null : JSON.stringify(inner), null, null, null, 'generic'],
    ['di', 42],
  ])}`;

const embedPage = (widget: unknown) => {
  const escaped = JSON.stringify(widget)
    .replace(/\{/g, '\\x7b')
    .replace(/\}/g, '\\x7d')
    .replace(/"/g, '\\x22');
  return `<html><script>var widget = JSON.parse('${escaped}');</script></html>`;
};

describe('ResponseDecoderService', () => {
  const decoder = new ResponseDecoderService();
  const columns = [column('tea'), column('coffee')];

  describe('time, multiline', () => {
    const payload = widgetPayload({
      default: {
        timelineData: [
          { time: '1704067200', formattedTime: 'Jan 1, 2024', value: [10, 20] },
          { time: '1704153600', formattedTime: 'Jan 2, 2024', value: [30, 40], isPartial: true },
        ],
      },
    });

    it('produces one global series per column', () => {
      const series = decoder.decodeMultiline(payload, columns);
      expect(series).toHaveLength(2);
      expect(series[0]).toEqual({
        keyword: 'tea',
        label: 'tea',
        geo: '',
        timeframe: 'today 3-m',
        normalizationScope: 'global',
        points: [
          { timestamp: '2024-01-01T00:00:00.000Z', value: 10, isPartial: false },
          { timestamp: '2024-01-02T00:00:00.000Z', value: 30, isPartial: true },
        ],
      });
      expect(series[1].points.map((p) => p.value)).toEqual([20, 40]);
    });

    it('decodes buffers through the tagged entry point', () => {
      const decoded = decoder.decode(Buffer.from(payload), {
        shape: 'time',
        layout: 'multiline',
        columns,
      });
      expect(decoded.shape).toBe('time');
    });

    it('signals an empty timeline separately from garbage', () => {
      const empty = widgetPayload({ default: { timelineData: [] } });
      expect(() => decoder.decodeMultiline(empty, columns)).toThrow(EmptyResultError);
      try {
        decoder.decodeMultiline(empty, columns);
      } catch (error) {
        expect(error).toBeInstanceOf(EmptyResultError);
        expect(error).toHaveProperty('fatal', false);
      }
    });

    it.each([
      ['text that is not JSON', `${GUARD}\n<html>`],
      ['a missing envelope', widgetPayload({})],
      ['a non-numeric value', widgetPayload({ default: { timelineData: [{ time: '1', value: ['x', 1] }] } })],
      ['a wrong column count', widgetPayload({ default: { timelineData: [{ time: '1', value: [1] }] } })],
      ['only the guard', GUARD],
      [
        'a timestamp past the date range',
        widgetPayload({ default: { timelineData: [{ time: '99999999999999999', value: [1, 2] }] } }),
      ],
    ])('fails to decode %s', (_, text) => {
      expect(() => decoder.decodeMultiline(text, columns)).toThrow(DecodeError);
    });
  });

  describe('time, multirange', () => {
    const ranges = [column('tea', 'tea | US | 2024-01-25 12-d'), column('tea', 'tea | GB | 2024-06-20 23-d')];

    it('keeps each column on its own timestamps and drops missing points', () => {
      const series = decoder.decodeMultirange(
        widgetPayload({
          default: {
            timelineData: [
              {
                columnData: [
                  { time: '1704067200', value: 5 },
                  { time: '1718841600', value: -1 },
                ],
              },
              {
                columnData: [
                  { time: '1704153600', value: 7, isPartial: true },
                  { time: '1718928000', value: 9 },
                ],
              },
            ],
          },
        }),
        ranges
      );

      expect(series[0].points).toEqual([
        { timestamp: '2024-01-01T00:00:00.000Z', value: 5, isPartial: false },
        { timestamp: '2024-01-02T00:00:00.000Z', value: 7, isPartial: true },
      ]);
      expect(series[1].points).toEqual([
        { timestamp: '2024-06-21T00:00:00.000Z', value: 9, isPartial: false },
      ]);
    });

    it('treats all-missing columns as empty', () => {
      const text = widgetPayload({
        default: {
          timelineData: [{ columnData: [{ time: '1', value: -1 }, { time: '2', value: -1 }] }],
        },
      });
      expect(() => decoder.decodeMultirange(text, ranges)).toThrow(EmptyResultError);
    });
  });

  describe('region', () => {
    it('omits regions without data for a column', () => {
      const series = decoder.decodeRegion(
        widgetPayload({
          default: {
            geoMapData: [
              { geoCode: 'US-CA', geoName: 'California', value: [100, 40], hasData: [true, true] },
              { geoCode: 'US-WY', geoName: 'Wyoming', value: [0, 12], hasData: [false, true] },
              { geoCode: 'US-VT', geoName: 'Vermont', value: [0, 0], hasData: [false, false] },
            ],
          },
        }),
        columns
      );

      expect(series[0].points).toEqual([
        { regionCode: 'US-CA', regionName: 'California', value: 100 },
      ]);
      expect(series[1].points).toEqual([
        { regionCode: 'US-CA', regionName: 'California', value: 40 },
        { regionCode: 'US-WY', regionName: 'Wyoming', value: 12 },
      ]);
    });

    it('keeps city coordinates', () => {
      const [series] = decoder.decodeRegion(
        widgetPayload({
          default: {
            geoMapData: [
              {
                geoName: 'Austin',
                coordinates: { lat: 30.27, lng: -97.74 },
                value: [80],
                hasData: [true],
              },
            ],
          },
        }),
        [column('tea')]
      );
      expect(series.points).toEqual([
        { regionCode: '', regionName: 'Austin', value: 80, coordinates: { lat: 30.27, lng: -97.74 } },
      ]);
    });

    it('checks every row against the columns, with data or not', () => {
      const text = widgetPayload({
        default: {
          geoMapData: [
            { geoCode: 'US-CA', geoName: 'California', value: [100, 40], hasData: [true, true] },
            { geoCode: 'US-WY', geoName: 'Wyoming', value: [0], hasData: [false] },
          ],
        },
      });
      expect(() => decoder.decodeRegion(text, columns)).toThrow(DecodeError);
      expect(() => decoder.decodeRegion(text, columns)).toThrow(
        '"Wyoming" has 1 values and 1 flags for 2 columns'
      );
    });

    it('reports an empty map', () => {
      expect(() =>
        decoder.decodeRegion(widgetPayload({ default: { geoMapData: [] } }), columns)
      ).toThrow(EmptyResultError);
    });
  });

  describe('batch showcase', () => {
    const requestedAt = new Date('2024-09-15T10:30:00Z');
    const ramp = (length: number, max: number) =>
      Array.from({ length }, (_, i) => Math.round((i / (length - 1)) * max));

    it('synthesizes timestamps back from the last completed step', () => {
      const series = decoder.decodeBatch(
        rpcPayload('jpdkv', [[['tea', ramp(91, 100)], ['coffee', ramp(90, 50)]]]),
        'Past24H',
        requestedAt
      );

      const [tea, coffee] = series;
      expect(tea.points).toHaveLength(91);
      expect(tea.points[0].timestamp).toBe('2024-09-14T10:24:00.000Z');
      expect(tea.points[90].timestamp).toBe('2024-09-15T10:24:00.000Z');

      // one short: the newest step is not published yet
      expect(coffee.points).toHaveLength(90);
      expect(coffee.points[0].timestamp).toBe('2024-09-14T10:24:00.000Z');
      expect(coffee.points[89].timestamp).toBe('2024-09-15T10:08:00.000Z');
    });

    it('never rescales one keyword against another', () => {
      const coffeeValues = ramp(90, 50);
      const [tea, coffee] = decoder.decodeBatch(
        rpcPayload('jpdkv', [[['tea', ramp(91, 100)], ['coffee', coffeeValues]]]),
        'Past24H',
        requestedAt
      );

      expect(tea.normalizationScope).toBe('self');
      expect(coffee.normalizationScope).toBe('self');
      expect(coffee.points.map((p) => p.value)).toEqual(coffeeValues);
      expect(Math.max(...coffee.points.map((p) => p.value))).toBe(50);
    });

    it('steps back once more right after a boundary', () => {
      const [tea] = decoder.decodeBatch(
        rpcPayload('jpdkv', [[['tea', ramp(91, 100)]]]),
        'Past24H',
        new Date('2024-09-15T10:24:30Z')
      );
      expect(tea.points[90].timestamp).toBe('2024-09-15T10:08:00.000Z');
    });

    it('dates a short series with the full ones right after a boundary', () => {
      const [tea, coffee] = decoder.decodeBatch(
        rpcPayload('jpdkv', [[['tea', ramp(91, 100)], ['coffee', ramp(90, 50)]]]),
        'Past24H',
        new Date('2024-09-15T10:24:30Z')
      );
      expect(tea.points[90].timestamp).toBe('2024-09-15T10:08:00.000Z');
      expect(coffee.points[89].timestamp).toBe('2024-09-15T10:08:00.000Z');
      expect(coffee.points[0].timestamp).toBe('2024-09-14T10:24:00.000Z');
    });

    it('uses the window step', () => {
      const [fourHours] = decoder.decodeBatch(
        rpcPayload('jpdkv', [[['tea', ramp(31, 100)]]]),
        'Past4H',
        requestedAt
      );
      expect(fourHours.points[0].timestamp).toBe('2024-09-15T06:24:00.000Z');
      expect(fourHours.points[30].timestamp).toBe('2024-09-15T10:24:00.000Z');

      const [week] = decoder.decodeBatch(
        rpcPayload('jpdkv', [[['tea', ramp(43, 100)]]]),
        'Past7D',
        requestedAt
      );
      expect(week.points[0].timestamp).toBe('2024-09-08T08:00:00.000Z');
      expect(week.points[42].timestamp).toBe('2024-09-15T08:00:00.000Z');
    });

    it('names the keyword whose point count is off', () => {
      const text = rpcPayload('jpdkv', [[['tea', ramp(80, 100)]]]);
      expect(() => decoder.decodeBatch(text, 'Past24H', requestedAt)).toThrow(
        PointCountMismatchError
      );
      expect(() => decoder.decodeBatch(text, 'Past24H', requestedAt)).toThrow(
        'Keyword "tea" has 80 points, expected 91'
      );
    });

    it('reports an empty batch', () => {
      expect(() =>
        decoder.decodeBatch(rpcPayload('jpdkv', [[]]), 'Past24H', requestedAt)
      ).toThrow(EmptyResultError);
      expect(() =>
        decoder.decodeBatch(rpcPayload('jpdkv', null), 'Past24H', requestedAt)
      ).toThrow(EmptyResultError);
    });

    it('rejects a frame without the response', () => {
      const text = `${GUARD}\n${JSON.stringify([['di', 42]])}`;
      expect(() => decoder.decodeBatch(text, 'Past24H', requestedAt)).toThrow(DecodeError);
    });
  });

  describe('related', () => {
    it('splits top and rising lists', () => {
      const result = decoder.decodeRelated(
        widgetPayload({
          default: {
            rankedList: [
              { rankedKeyword: [{ query: 'green tea', value: 100, formattedValue: '100' }] },
              {
                rankedKeyword: [
                  { query: 'bubble tea', value: 5000, formattedValue: 'Breakout' },
                  { query: 'chai', value: 250, formattedValue: '+250%' },
                ],
              },
            ],
          },
        }),
        'tea'
      );

      expect(result.top).toEqual([
        { query: 'green tea', value: 100, formattedValue: '100', isBreakout: false },
      ]);
      expect(result.rising).toEqual([
        { query: 'bubble tea', value: 5000, formattedValue: 'Breakout', isBreakout: true },
        { query: 'chai', value: 250, formattedValue: '+250%', isBreakout: false },
      ]);
    });

    it('reads topics', () => {
      const result = decoder.decodeRelated(
        widgetPayload({
          default: {
            rankedList: [
              {
                rankedKeyword: [
                  {
                    topic: { mid: '/m/test', title: 'Tea', type: 'Beverage' },
                    value: 100,
                    formattedValue: '100',
                  },
                ],
              },
              { rankedKeyword: [] },
            ],
          },
        }),
        'tea'
      );
      expect(result.top).toEqual([
        {
          query: 'Tea',
          value: 100,
          formattedValue: '100',
          isBreakout: false,
          topicType: 'Beverage',
          mid: '/m/test',
        },
      ]);
      expect(result.rising).toEqual([]);
    });

    it('reports no related searches', () => {
      const text = widgetPayload({
        default: { rankedList: [{ rankedKeyword: [] }, { rankedKeyword: [] }] },
      });
      expect(() => decoder.decodeRelated(text, 'tea')).toThrow('No related data returned for "tea"');
    });
  });

  describe('trending', () => {
    it('reads trending searches', () => {
      const topics = decoder.decodeTrending(
        rpcPayload('i0OFE', [
          null,
          [
            [
              'solar eclipse',
              null,
              'US',
              [1712592000],
              null,
              null,
              500000,
              null,
              1000,
              ['eclipse time', 'eclipse glasses'],
              [3, 17],
              [],
              'solar eclipse',
            ],
          ],
        ]),
        'US'
      );

      expect(topics).toEqual([
        {
          keyword: 'solar eclipse',
          geo: 'US',
          startedAt: '2024-04-08T16:00:00.000Z',
          endedAt: null,
          volume: 500000,
          volumeGrowthPct: 1000,
          relatedKeywords: ['eclipse time', 'eclipse glasses'],
          topicIds: [3, 17],
        },
      ]);
    });

    it('reports an empty feed', () => {
      expect(() => decoder.decodeTrending(rpcPayload('i0OFE', [null, []]), 'US')).toThrow(
        EmptyResultError
      );
    });
  });

  describe('picker', () => {
    it('reads the geo tree', () => {
      const tree = decoder.decodePicker(
        widgetPayload({
          name: 'Worldwide',
          id: '',
          children: [{ name: 'United States', id: 'US', children: [{ name: 'New York', id: 'NY' }] }],
        })
      );
      expect(tree.children?.[0].children?.[0]).toEqual({ name: 'New York', id: 'NY' });
    });

    it('turns numeric category ids into strings', () => {
      const tree = decoder.decodePicker(
        widgetPayload({ name: 'All categories', id: 0, children: [{ name: 'Sports', id: 20 }] })
      );
      expect(tree).toEqual({
        name: 'All categories',
        id: '0',
        children: [{ name: 'Sports', id: '20' }],
      });
    });
  });

  describe('suggestions', () => {
    it('reads the autocomplete topics', () => {
      const suggestions = decoder.decodeSuggestions(
        widgetPayload({
          default: {
            topics: [
              { mid: '/m/07clx', title: 'Tea', type: 'Beverage' },
              { mid: '/g/11test', title: 'tea time', type: 'Search term' },
            ],
          },
        })
      );
      expect(suggestions).toEqual([
        { mid: '/m/07clx', title: 'Tea', type: 'Beverage' },
        { mid: '/g/11test', title: 'tea time', type: 'Search term' },
      ]);
    });

    it('returns no suggestions as an empty list', () => {
      expect(decoder.decodeSuggestions(widgetPayload({ default: { topics: [] } }))).toEqual([]);
    });

    it('rejects a topic without a title', () => {
      expect(() =>
        decoder.decodeSuggestions(
          widgetPayload({ default: { topics: [{ mid: '/m/07clx', type: 'Beverage' }] } })
        )
      ).toThrow(DecodeError);
    });

    it('decodes by shape tag', () => {
      expect(
        decoder.decode(widgetPayload({ default: { topics: [] } }), { shape: 'suggestions' })
      ).toEqual({ shape: 'suggestions', suggestions: [] });
    });
  });

  describe('token', () => {
    it('extracts the widget token from the embed page', () => {
      const token = decoder.decodeToken(
        embedPage({
          token: 'test-token',
          type: 'fe_line_chart',
          request: { time: 'today 3-m' },
        })
      );
      expect(token).toEqual({
        token: 'test-token',
        type: 'fe_line_chart',
        request: { time: 'today 3-m' },
        overQuota: false,
      });
    });

    it('flags an over-quota token', () => {
      const token = decoder.decodeToken(
        embedPage({
          token: 'test-token',
          type: 'fe_related_searches',
          request: { userConfig: { userType: 'USER_TYPE_EMBED_OVER_QUOTA' } },
        })
      );
      expect(token.overQuota).toBe(true);
    });

    it('fails on a page without a widget', () => {
      expect(() => decoder.decodeToken('<html></html>')).toThrow(DecodeError);
    });

    it('unescapes hex sequences', () => {
      expect(unescapeEmbedded('\\x7b\\x22a\\x22:\\x22b\\x26c\\x22\\x7d')).toBe('{"a":"b&c"}');
    });
  });
});
