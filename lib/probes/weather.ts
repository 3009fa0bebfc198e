import type { HttpClient } from '../deps';
import type { Drawable } from '../drawables';
import { stripAnsi } from '../format';
import { BaseProbe } from '../probe';

export interface WeatherReport {
  title: string;
  text: string;
}

export interface WeatherState {
  report: WeatherReport | null;
}

const WEATHER_HEIGHT = 7;

export function weatherUrl(location: string) {
  return `http://wttr.in/${encodeURIComponent(location)}?T0q`;
}

/**
 * wttr.in answers with the location on the first line, a blank line, then the
 * current conditions.
 */
export function parseWeather(body: string): WeatherReport | null {
  const first = body.indexOf('\n');
  const second = first >= 0 ? body.indexOf('\n', first + 1) : -1;
  if (second < 0) return null;

  return {
    title: body.slice(0, first),
    text: stripAnsi(body.slice(second + 1)).replace(/[ \t\n]+$/, ''),
  };
}

export class WeatherProbe extends BaseProbe<WeatherState> {
  constructor(
    private readonly http: HttpClient,
    private readonly location: string,
    intervalMs: number,
  ) {
    super('weather', { report: null }, intervalMs);
  }

  protected async sample(): Promise<WeatherState | null> {
    const url = weatherUrl(this.location);
    const result = await this.http.get(url, { 'User-Agent': 'curl' });

    if (!result.ok) {
      this.log.warn({ url, status: result.status, err: result.err }, 'Failed to load weather');
      return null;
    }

    const report = parseWeather(result.out);
    if (report === null) {
      this.log.warn({ url, raw: result.out }, 'Unexpected weather response');
      return null;
    }

    return { report };
  }

  protected view(state: WeatherState): Drawable {
    const report = state.report ?? { title: 'Weather', text: '(loading)' };

    return {
      kind: 'text',
      height: WEATHER_HEIGHT,
      border: true,
      title: [{ text: report.title, color: 'green' }],
      lines: report.text.split('\n').map(text => [{ text }]),
    };
  }
}
