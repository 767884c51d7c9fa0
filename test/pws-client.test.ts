import { EmptyObservationsError, UpstreamNetworkError, UpstreamParseError } from '../src/utils/errors.js';
import { createFetchWithTimeout, redactSecret, type FetchImpl } from '../src/utils/http-client.js';
import { buildObservationUrl, createPwsClient } from '../src/utils/pws-client.js';
import { API_BASE, API_KEY, STATION_ID, buildBody, buildObservation, jsonResponse } from './helpers/fixtures.js';

const EXPECTED_URL = `${API_BASE}?stationId=${STATION_ID}&format=json&units=e&apiKey=${API_KEY}`;

const createClient = (fetchImpl: FetchImpl, timeoutMs: number = 1000, apiKey: string = API_KEY) =>
  createPwsClient({
    apiBase: API_BASE,
    stationId: STATION_ID,
    units: 'e',
    apiKey,
    fetchWithTimeout: createFetchWithTimeout(timeoutMs, fetchImpl),
  });

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

test('buildObservationUrl puts the query parameters in upstream order', () => {
  expect(buildObservationUrl({ apiBase: API_BASE, stationId: STATION_ID, units: 'e', apiKey: API_KEY })).toBe(EXPECTED_URL);
});

test('requests current observations with JSON headers', async () => {
  const fetchImpl = vi.fn<Parameters<FetchImpl>, ReturnType<FetchImpl>>(async () => jsonResponse(buildBody(buildObservation())));
  const set = await createClient(fetchImpl).fetchCurrent();

  expect(set.observations[0]?.stationID).toBe(STATION_ID);
  expect(fetchImpl).toHaveBeenCalledTimes(1);
  const [url, init] = fetchImpl.mock.calls[0];
  expect(url).toBe(EXPECTED_URL);
  expect(init?.method).toBe('GET');
  expect(init?.headers).toEqual({ Accept: 'application/json', 'Content-Type': 'application/json' });
  expect(init?.signal).toBeInstanceOf(AbortSignal);
});

test('logs the request URL with the API key redacted', async () => {
  await createClient(async () => jsonResponse(buildBody(buildObservation()))).fetchCurrent();
  expect(console.log).toHaveBeenCalledWith(
    `[Upstream] Making API request to: ${API_BASE}?stationId=${STATION_ID}&format=json&units=e&apiKey=***REDACTED***`,
  );
});

test('keys with reserved characters are redacted in their encoded form', async () => {
  await createClient(async () => jsonResponse(buildBody(buildObservation())), 1000, 'abc+def/ghi=').fetchCurrent();
  expect(console.log).toHaveBeenCalledWith(
    `[Upstream] Making API request to: ${API_BASE}?stationId=${STATION_ID}&format=json&units=e&apiKey=***REDACTED***`,
  );
});

test('redactSecret masks raw, percent-encoded and form-encoded secrets', () => {
  expect(redactSecret('a=test key&b=test%20key&c=test+key', 'test key')).toBe(
    'a=***REDACTED***&b=***REDACTED***&c=***REDACTED***',
  );
});

test('non-2xx responses are network errors carrying the status', async () => {
  const error = await createClient(async () => jsonResponse('{}', 500))
    .fetchCurrent()
    .catch((caught: unknown) => caught);
  expect(error).toBeInstanceOf(UpstreamNetworkError);
  expect(error instanceof UpstreamNetworkError && error.status).toBe(500);
});

test('transport failures are network errors with the key redacted', async () => {
  const error = await createClient(async (url) => {
    throw new Error(`connect ECONNREFUSED for ${url}`);
  })
    .fetchCurrent()
    .catch((caught: unknown) => caught);
  expect(error).toBeInstanceOf(UpstreamNetworkError);
  expect(error instanceof Error && error.message).toBe(
    `Error making HTTP request: connect ECONNREFUSED for ${API_BASE}?stationId=${STATION_ID}&format=json&units=e&apiKey=***REDACTED***`,
  );
});

test('a request that outlives the timeout is a network error', async () => {
  const hang: FetchImpl = (_url, init) =>
    new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  await expect(createClient(hang, 20).fetchCurrent()).rejects.toBeInstanceOf(UpstreamNetworkError);
});

test('a body that never finishes is cut off by the timeout', async () => {
  const stalledBody: FetchImpl = async () =>
    new Response(
      new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"observations":['));
        },
      }),
      { status: 200 },
    );
  const error = await createClient(stalledBody, 20)
    .fetchCurrent()
    .catch((caught: unknown) => caught);
  expect(error).toBeInstanceOf(UpstreamNetworkError);
  expect(error instanceof Error && error.message).toBe('Error making HTTP request: Request timed out after 20ms');
});

test('malformed bodies are parse errors', async () => {
  await expect(createClient(async () => jsonResponse('<html>oops</html>')).fetchCurrent()).rejects.toBeInstanceOf(UpstreamParseError);
});

test('empty observation lists and 204 responses are empty-result errors', async () => {
  await expect(createClient(async () => jsonResponse('{"observations":[]}')).fetchCurrent()).rejects.toBeInstanceOf(EmptyObservationsError);
  await expect(createClient(async () => new Response(null, { status: 204 })).fetchCurrent()).rejects.toBeInstanceOf(
    EmptyObservationsError,
  );
});
