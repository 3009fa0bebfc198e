import { describe, it, expect } from 'vitest';
import { lineText } from '../drawables';
import { parseWeather, WeatherProbe, weatherUrl } from '../probes/weather';
import { MockHttpClient } from './mocks';

const REPORT = 'Weather report: Oslo\n\n     \x1B[38;5;226mSunny\x1B[0m\n  +21°C  \n\n';

describe('parseWeather', () => {
  it('splits title and conditions', () => {
    expect(parseWeather(REPORT)).toEqual({
      title: 'Weather report: Oslo',
      text: '     Sunny\n  +21°C',
    });
  });

  it('rejects bodies with fewer than three parts', () => {
    expect(parseWeather('Unknown location')).toBeNull();
    expect(parseWeather('line one\nline two')).toBeNull();
  });
});

describe('WeatherProbe', () => {
  it('requests plain text as curl and draws the report', async () => {
    const http = new MockHttpClient();
    http.setResponse('http://wttr.in/Oslo?T0q', REPORT);
    const probe = new WeatherProbe(http, 'Oslo', 3_600_000);

    await probe.refresh(new Date(0));

    expect(http.requests).toEqual([{ url: 'http://wttr.in/Oslo?T0q', headers: { 'User-Agent': 'curl' } }]);
    const drawable = probe.renderTarget();
    expect(drawable.title).toEqual([{ text: 'Weather report: Oslo', color: 'green' }]);
    expect(drawable.kind === 'text' ? drawable.lines.map(lineText) : []).toEqual(['     Sunny', '  +21°C']);
  });

  it('keeps the last report when a response is malformed', async () => {
    const http = new MockHttpClient();
    http.setResponse('http://wttr.in/Oslo?T0q', REPORT);
    const probe = new WeatherProbe(http, 'Oslo', 3_600_000);
    await probe.refresh(new Date(0));

    http.setResponse('http://wttr.in/Oslo?T0q', 'Sorry');
    await probe.refresh(new Date(3_600_001));

    expect(probe.state.report?.title).toBe('Weather report: Oslo');
  });

  it('leaves an empty location to the service', () => {
    expect(weatherUrl('')).toBe('http://wttr.in/?T0q');
    expect(weatherUrl('New York')).toBe('http://wttr.in/New%20York?T0q');
  });
});
