import { z } from 'zod';
import { TransportError, describeError } from '../errors.js';

const API_BASE = 'https://trends.google.com/trends/api';
const USER_AGENT = 'momentum-pipeline/0.1.0';

/**
 * A single external lookup of a keyword's weekly interest series.
 * Implementations throw TransportError; retrying and pacing belong to the fetcher.
 */
export interface TrendsTransport {
  fetchWeekly(keyword: string, geo: string, timeframe: string): Promise<number[]>;
}

const ExploreSchema = z.object({
  widgets: z.array(
    z.object({
      id: z.string(),
      token: z.string().optional(),
      request: z.unknown().optional(),
    }),
  ),
});

const MultilineSchema = z.object({
  default: z.object({
    timelineData: z.array(
      z.object({
        time: z.string().optional(),
        formattedTime: z.string().optional(),
        value: z.array(z.number()),
        isPartial: z.boolean().optional(),
      }),
    ),
  }),
});

export type TimelinePoint = z.infer<typeof MultilineSchema>['default']['timelineData'][number];

/** Google prefixes JSON responses with `)]}'` to defeat script inclusion. */
export function stripXssiPrefix(body: string): string {
  const start = body.indexOf('{');
  if (start === -1) throw new TransportError('Response body contains no JSON object');
  return body.slice(start);
}

function parseBody<T>(body: string, schema: z.ZodType<T>, what: string): T {
  let json: unknown;
  try {
    json = JSON.parse(stripXssiPrefix(body));
  } catch (err) {
    if (err instanceof TransportError) throw err;
    throw new TransportError(`Malformed ${what} response: ${describeError(err)}`, undefined, { cause: err });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new TransportError(`Unexpected ${what} response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

/**
 * Convert timeline rows to a weekly series, oldest first.
 * A trailing partial week is dropped since its value is still moving.
 */
export function timelineToSeries(points: readonly TimelinePoint[]): number[] {
  const complete = points.length > 0 && points[points.length - 1].isPartial ? points.slice(0, -1) : points;
  return complete.map((p) => p.value[0] ?? 0);
}

export interface GoogleTrendsTransportOptions {
  hl?: string;
  tz?: number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/** Interest-over-time via the explore widget token and the multiline endpoint. */
export class GoogleTrendsTransport implements TrendsTransport {
  private readonly hl: string;
  private readonly tz: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: GoogleTrendsTransportOptions = {}) {
    this.hl = opts.hl ?? 'en-US';
    this.tz = opts.tz ?? 360;
    this.timeoutMs = opts.timeoutMs ?? 25_000;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async fetchWeekly(keyword: string, geo: string, timeframe: string): Promise<number[]> {
    const explore = await this.get('explore', {
      req: JSON.stringify({
        comparisonItem: [{ keyword, geo, time: timeframe }],
        category: 0,
        property: '',
      }),
    });
    const { widgets } = parseBody(explore, ExploreSchema, 'explore');

    const widget = widgets.find((w) => w.id === 'TIMESERIES');
    if (!widget?.token || widget.request === undefined) {
      throw new TransportError(`No TIMESERIES widget returned for "${keyword}"`);
    }

    const multiline = await this.get('widgetdata/multiline', {
      req: JSON.stringify(widget.request),
      token: widget.token,
    });
    const data = parseBody(multiline, MultilineSchema, 'multiline');
    return timelineToSeries(data.default.timelineData);
  }

  private async get(path: string, params: Record<string, string>): Promise<string> {
    const url = new URL(`${API_BASE}/${path}`);
    url.searchParams.set('hl', this.hl);
    url.searchParams.set('tz', String(this.tz));
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        headers: { 'User-Agent': USER_AGENT },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new TransportError(`Google Trends ${path} request failed: ${describeError(err)}`, undefined, { cause: err });
    }

    if (!res.ok) {
      throw new TransportError(`Google Trends ${path} returned ${res.status}`, res.status);
    }
    return res.text();
  }
}
