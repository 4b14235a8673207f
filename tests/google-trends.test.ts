import { describe, it, expect, vi } from 'vitest';
import { GoogleTrendsTransport, stripXssiPrefix, timelineToSeries } from '../src/trends/google-trends.js';
import { TransportError } from '../src/errors.js';

const exploreBody = `)]}'
${JSON.stringify({
  widgets: [
    { id: 'RELATED_TOPICS', token: 'rt-token', request: {} },
    { id: 'TIMESERIES', token: 'ts-token', request: { time: '2021-03-01 2026-03-01', resolution: 'WEEK' } },
  ],
})}`;

const multilineBody = `)]}',
${JSON.stringify({
  default: {
    timelineData: [
      { time: '1700000000', formattedTime: 'Nov 12 – 18, 2023', value: [12] },
      { time: '1700604800', formattedTime: 'Nov 19 – 25, 2023', value: [30] },
      { time: '1701209600', formattedTime: 'Nov 26 – Dec 2, 2023', value: [55] },
      { time: '1701814400', formattedTime: 'Dec 3 – 9, 2023', value: [61], isPartial: true },
    ],
  },
})}`;

function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

describe('stripXssiPrefix', () => {
  it('drops everything before the first brace', () => {
    expect(stripXssiPrefix(")]}',\n{\"a\":1}")).toBe('{"a":1}');
  });

  it('rejects bodies without JSON', () => {
    expect(() => stripXssiPrefix('<html>blocked</html>')).toThrow(TransportError);
  });
});

describe('timelineToSeries', () => {
  it('keeps complete weeks oldest first', () => {
    expect(timelineToSeries([{ value: [1] }, { value: [2] }, { value: [3], isPartial: true }])).toEqual([1, 2]);
    expect(timelineToSeries([{ value: [4] }, { value: [] }])).toEqual([4, 0]);
  });
});

describe('GoogleTrendsTransport', () => {
  it('resolves the TIMESERIES widget and returns its weekly values', async () => {
    const fetchImpl = vi.fn<typeof fetch>()
      .mockResolvedValueOnce(textResponse(exploreBody))
      .mockResolvedValueOnce(textResponse(multilineBody));
    const transport = new GoogleTrendsTransport({ fetchImpl, hl: 'en-US', tz: 360 });

    const series = await transport.fetchWeekly('matcha latte', 'US', 'today 5-y');

    expect(series).toEqual([12, 30, 55]);
    expect(fetchImpl).toHaveBeenCalledTimes(2);

    const exploreUrl = new URL(String(fetchImpl.mock.calls[0][0]));
    expect(exploreUrl.pathname).toBe('/trends/api/explore');
    expect(exploreUrl.searchParams.get('hl')).toBe('en-US');
    expect(JSON.parse(exploreUrl.searchParams.get('req') ?? '')).toEqual({
      comparisonItem: [{ keyword: 'matcha latte', geo: 'US', time: 'today 5-y' }],
      category: 0,
      property: '',
    });

    const multilineUrl = new URL(String(fetchImpl.mock.calls[1][0]));
    expect(multilineUrl.pathname).toBe('/trends/api/widgetdata/multiline');
    expect(multilineUrl.searchParams.get('token')).toBe('ts-token');
    expect(JSON.parse(multilineUrl.searchParams.get('req') ?? '')).toEqual({
      time: '2021-03-01 2026-03-01',
      resolution: 'WEEK',
    });
  });

  it('surfaces HTTP errors with their status', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValueOnce(textResponse('slow down', 429));
    const transport = new GoogleTrendsTransport({ fetchImpl });

    await expect(transport.fetchWeekly('x', '', 'today 5-y')).rejects.toMatchObject({
      name: 'TransportError',
      status: 429,
      message: 'Google Trends explore returned 429',
    });
  });

  it('wraps network failures', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValueOnce(new Error('socket hang up'));
    const transport = new GoogleTrendsTransport({ fetchImpl });

    await expect(transport.fetchWeekly('x', '', 'today 5-y')).rejects.toThrow(
      'Google Trends explore request failed: socket hang up',
    );
  });

  it('fails when no TIMESERIES widget is present', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValueOnce(
      textResponse(`)]}'\n${JSON.stringify({ widgets: [{ id: 'GEO_MAP', token: 't' }] })}`),
    );
    const transport = new GoogleTrendsTransport({ fetchImpl });

    await expect(transport.fetchWeekly('x', '', 'today 5-y')).rejects.toThrow('No TIMESERIES widget returned for "x"');
  });

  it('rejects an unexpected multiline shape', async () => {
    const fetchImpl = vi.fn<typeof fetch>()
      .mockResolvedValueOnce(textResponse(exploreBody))
      .mockResolvedValueOnce(textResponse(`)]}',\n{"default":{"timelineData":[{"value":"high"}]}}`));
    const transport = new GoogleTrendsTransport({ fetchImpl });

    await expect(transport.fetchWeekly('x', '', 'today 5-y')).rejects.toBeInstanceOf(TransportError);
  });
});
