// Unit tests for the Odds API client (fake transport, no network)

import { Response } from 'node-fetch';
import { loadConfig } from '../src/config/index.js';
import type { FetchLike } from '../src/net/index.js';
import { OddsApiError, OddsClient } from '../src/odds/client.js';

const config = loadConfig({ ODDS_API_KEY: 'test-key', ODDS_API_BASE: 'https://odds.test/v4/' });

function jsonFetch(body: unknown, status: number = 200, statusText: string = 'OK') {
  return vi.fn<FetchLike>(async () => new Response(JSON.stringify(body), { status, statusText }));
}

describe('OddsClient', () => {
  test('requires an API key', () => {
    expect(() => new OddsClient(loadConfig({}))).toThrow('Missing env var: ODDS_API_KEY');
  });

  test('requests american odds for the NBA with the requested markets', async () => {
    const fetch = jsonFetch([]);
    await new OddsClient(config, { fetch }).fetchEvents(['h2h', 'spreads', 'totals']);

    expect(fetch).toHaveBeenCalledTimes(1);
    const url = new URL(String(fetch.mock.calls[0][0]));
    expect(url.origin + url.pathname).toBe('https://odds.test/v4/sports/basketball_nba/odds');
    expect(url.searchParams.get('apiKey')).toBe('test-key');
    expect(url.searchParams.get('regions')).toBe('us');
    expect(url.searchParams.get('markets')).toBe('h2h,spreads,totals');
    expect(url.searchParams.get('oddsFormat')).toBe('american');
    expect(url.searchParams.get('dateFormat')).toBe('iso');
  });

  test('fetchGames aggregates the payload', async () => {
    const fetch = jsonFetch([
      {
        id: 'evt-1',
        home_team: 'Boston Celtics',
        away_team: 'New York Knicks',
        bookmakers: [
          {
            markets: [
              {
                key: 'h2h',
                outcomes: [
                  { name: 'Boston Celtics', price: -150 },
                  { name: 'New York Knicks', price: 130 },
                ],
              },
            ],
          },
        ],
      },
      { id: 'evt-2', home_team: 'Miami Heat' },
    ]);

    const games = await new OddsClient(config, { fetch }).fetchGames();
    expect(games).toHaveLength(1);
    expect(games[0].markets.h2h).toEqual({ home: -150, away: 130 });
  });

  test('non-2xx response is fatal', async () => {
    const fetch = jsonFetch({ message: 'bad key' }, 401, 'Unauthorized');
    const client = new OddsClient(config, { fetch });

    await expect(client.fetchGames()).rejects.toThrow(OddsApiError);
    await expect(client.fetchGames()).rejects.toThrow('Odds API error: 401 Unauthorized');
  });

  test('non-list body is rejected', async () => {
    const fetch = jsonFetch({ message: 'quota exceeded' });
    await expect(new OddsClient(config, { fetch }).fetchEvents()).rejects.toThrow(
      'Odds API error: expected a list of games',
    );
  });

  test('2xx body that is not JSON is an API error', async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response('<html>maintenance</html>', { status: 200 }));
    const client = new OddsClient(config, { fetch });

    await expect(client.fetchEvents()).rejects.toThrow(OddsApiError);
    await expect(client.fetchEvents()).rejects.toThrow('Odds API error: invalid JSON body');
  });

  test('transport failure is wrapped', async () => {
    const fetch = vi.fn<FetchLike>(async () => {
      throw new Error('socket hang up');
    });
    await expect(new OddsClient(config, { fetch }).fetchEvents()).rejects.toThrow(
      'Odds API request failed: socket hang up',
    );
  });
});
