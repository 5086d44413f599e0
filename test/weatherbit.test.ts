import { ConfigurationError, ProviderError } from '../src/utils/errors.js';
import { createFetchWithTimeout, type FetchWithTimeout } from '../src/utils/http-client.js';
import { createWeatherbitClient, loadWeatherbitConfig, WEATHERBIT_CURRENT_URL, type WeatherbitConfig } from '../src/utils/weatherbit.js';
import { buildPayload, jsonResponse } from './helpers.js';

const config: WeatherbitConfig = { apiKey: 'test-key', baseUrl: WEATHERBIT_CURRENT_URL, timeoutMs: 20000 };

const fakeFetch = (respond: FetchWithTimeout) => {
  const calls: Array<{ url: string; timeoutMs: number | undefined }> = [];
  const fetchWithTimeout: FetchWithTimeout = (url, options, timeoutMs) => {
    calls.push({ url, timeoutMs });
    return respond(url, options, timeoutMs);
  };
  return { calls, fetchWithTimeout };
};

describe('loadWeatherbitConfig', () => {
  test('throws ConfigurationError when the key is missing or blank', () => {
    expect(() => loadWeatherbitConfig({}, { timeoutMs: 20000 })).toThrow(ConfigurationError);
    expect(() => loadWeatherbitConfig({ WEATHERBIT_API_KEY: '   ' }, { timeoutMs: 20000 })).toThrow(
      'WEATHERBIT_API_KEY is not set; add it to the environment or .env',
    );
  });

  test('builds the client configuration from the environment', () => {
    expect(loadWeatherbitConfig({ WEATHERBIT_API_KEY: ' test-key ' }, { timeoutMs: 5000 })).toEqual({
      apiKey: 'test-key',
      baseUrl: 'https://api.weatherbit.io/v2.0/current',
      timeoutMs: 5000,
    });
    expect(
      loadWeatherbitConfig({ WEATHERBIT_API_KEY: 'test-key', WEATHERBIT_BASE_URL: 'http://localhost:9999/current' }, { timeoutMs: 5000 })
        .baseUrl,
    ).toBe('http://localhost:9999/current');
  });
});

describe('createWeatherbitClient', () => {
  test('fetchByCity sends city, key, lang, units and the optional country', async () => {
    const { calls, fetchWithTimeout } = fakeFetch(async () => jsonResponse(200, buildPayload()));
    const client = createWeatherbitClient({ config, fetchWithTimeout });

    const payload = await client.fetchByCity({ city: 'Rio de Janeiro', country: 'BR' });
    await client.fetchByCity({ city: 'Lisboa', lang: 'en', units: 'I' });

    expect(payload.data?.[0]?.city_name).toBe('Rio de Janeiro');
    expect(calls).toEqual([
      {
        url: 'https://api.weatherbit.io/v2.0/current?city=Rio+de+Janeiro&key=test-key&lang=pt&units=M&country=BR',
        timeoutMs: 20000,
      },
      { url: 'https://api.weatherbit.io/v2.0/current?city=Lisboa&key=test-key&lang=en&units=I', timeoutMs: 20000 },
    ]);
  });

  test('fetchByCoords sends lat and lon', async () => {
    const { calls, fetchWithTimeout } = fakeFetch(async () => jsonResponse(200, buildPayload()));
    const client = createWeatherbitClient({ config, fetchWithTimeout });

    await client.fetchByCoords({ lat: -22.9, lon: -43.2 });

    expect(calls[0]?.url).toBe('https://api.weatherbit.io/v2.0/current?lat=-22.9&lon=-43.2&key=test-key&lang=pt&units=M');
  });

  test('a non-success status becomes a ProviderError carrying the status', async () => {
    const { fetchWithTimeout } = fakeFetch(async () => jsonResponse(403, { error: 'API key not valid' }));
    const client = createWeatherbitClient({ config, fetchWithTimeout });

    const error = await client.fetchByCity({ city: 'Rio de Janeiro' }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toHaveProperty('status', 403);
    expect(error).toHaveProperty('message', 'Weatherbit request failed with status 403: {"error":"API key not valid"}');
  });

  test('reads the error body of a non-success response', async () => {
    let bodyRead = false;
    const { fetchWithTimeout } = fakeFetch(async () => ({
      ok: false,
      status: 500,
      json: async () => ({}),
      text: async () => {
        bodyRead = true;
        return '';
      },
    }));
    const client = createWeatherbitClient({ config, fetchWithTimeout });

    await expect(client.fetchByCity({ city: 'Rio de Janeiro' })).rejects.toThrow(
      /^Weatherbit request failed with status 500$/,
    );
    expect(bodyRead).toBe(true);
  });

  test('a non-success response whose body cannot be read still reports the status', async () => {
    const { fetchWithTimeout } = fakeFetch(async () => ({
      ok: false,
      status: 502,
      json: async () => ({}),
      text: async () => {
        throw new Error('terminated');
      },
    }));
    const client = createWeatherbitClient({ config, fetchWithTimeout });

    await expect(client.fetchByCity({ city: 'Rio de Janeiro' })).rejects.toThrow(
      /^Weatherbit request failed with status 502$/,
    );
  });

  test('a transport failure becomes a ProviderError', async () => {
    const { fetchWithTimeout } = fakeFetch(async () => {
      throw new Error('socket hang up');
    });
    const client = createWeatherbitClient({ config, fetchWithTimeout });

    await expect(client.fetchByCity({ city: 'Rio de Janeiro' })).rejects.toThrow('Weatherbit request failed: socket hang up');
  });

  test('a body that is not JSON becomes a ProviderError', async () => {
    const { fetchWithTimeout } = fakeFetch(async () => ({
      ok: true,
      status: 200,
      json: async () => {
        throw new SyntaxError('Unexpected token <');
      },
      text: async () => '<html>',
    }));
    const client = createWeatherbitClient({ config, fetchWithTimeout });

    await expect(client.fetchByCity({ city: 'Rio de Janeiro' })).rejects.toThrow(
      'Weatherbit returned a non-JSON body: Unexpected token <',
    );
  });

  test('a payload of the wrong shape becomes a ProviderError', async () => {
    const { fetchWithTimeout } = fakeFetch(async () => jsonResponse(200, { data: 'nope' }));
    const client = createWeatherbitClient({ config, fetchWithTimeout });

    await expect(client.fetchByCity({ city: 'Rio de Janeiro' })).rejects.toThrow(ProviderError);
    await expect(client.fetchByCity({ city: 'Rio de Janeiro' })).rejects.toThrow('unexpected shape at data');
  });

  test('an empty result list is accepted', async () => {
    const { fetchWithTimeout } = fakeFetch(async () => jsonResponse(200, { count: 0, data: [] }));
    const client = createWeatherbitClient({ config, fetchWithTimeout });

    await expect(client.fetchByCity({ city: 'Atlantis' })).resolves.toEqual({ count: 0, data: [] });
  });
});

describe('createFetchWithTimeout', () => {
  test('aborts the request once the timeout elapses', async () => {
    const fetchWithTimeout = createFetchWithTimeout(10, (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      }),
    );

    await expect(fetchWithTimeout('http://weather.test/current')).rejects.toThrow('aborted');
  });

  test('forwards headers to the underlying fetch', async () => {
    const seen: Array<Record<string, string> | undefined> = [];
    const fetchWithTimeout = createFetchWithTimeout(1000, async (_url, init) => {
      seen.push(init.headers);
      return jsonResponse(200, {});
    });

    await fetchWithTimeout('http://weather.test/current', { headers: { 'User-Agent': 'test-agent' } });

    expect(seen).toEqual([{ 'User-Agent': 'test-agent' }]);
  });
});
