import { Logger } from 'homebridge';
import nock from 'nock';
import { MediaCache } from '../src/media/MediaCache';
import { FetchError } from '../src/api/errors';
import { MediaReference } from '../src/api/types';

// A mock logger for the tests
const mockLogger = {
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn(),
} as unknown as Logger;

const PHOTO_HOST = 'https://photos.example.com';

function reference(path: string, expiresAt = 10_000): MediaReference {
  return {
    device_id: 'CAM01',
    remote_url: `${PHOTO_HOST}${path}`,
    issued_at: 0,
    expires_at: expiresAt,
  };
}

describe('MediaCache', () => {
  let now: number;
  let cache: MediaCache;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    jest.clearAllMocks();
    nock.cleanAll();
    now = 1_000;
    cache = new MediaCache(mockLogger, { now: () => now });
  });

  it('should download once for two calls with the same unexpired reference', async () => {
    const scope = nock(PHOTO_HOST).get('/CAM01/a.jpg').once().reply(200, Buffer.from('jpeg-a'));
    const ref = reference('/CAM01/a.jpg');

    const first = await cache.getOrRefresh('CAM01', ref);
    const second = await cache.getOrRefresh('CAM01', ref);

    expect(first.bytes.toString()).toBe('jpeg-a');
    expect(first.reference).toBe(ref);
    expect(first.error).toBeUndefined();
    expect(second).toBe(first);
    expect(scope.isDone()).toBe(true);
    expect(mockLogger.warn).not.toHaveBeenCalled();
  });

  it('should treat a reference at exactly its expiry time as expired', async () => {
    nock(PHOTO_HOST)
      .get('/CAM01/a.jpg').reply(200, Buffer.from('jpeg-a'))
      .get('/CAM01/a.jpg').reply(200, Buffer.from('jpeg-a2'));
    const ref = reference('/CAM01/a.jpg', 5_000);

    await cache.getOrRefresh('CAM01', ref);
    now = 5_000;
    const result = await cache.getOrRefresh('CAM01', ref);

    expect(result.bytes.toString()).toBe('jpeg-a2');
    expect(result.error).toBeUndefined();
  });

  it('should download again when the URL changes', async () => {
    nock(PHOTO_HOST)
      .get('/CAM01/a.jpg').reply(200, Buffer.from('jpeg-a'))
      .get('/CAM01/b.jpg').reply(200, Buffer.from('jpeg-b'));

    await cache.getOrRefresh('CAM01', reference('/CAM01/a.jpg'));
    const result = await cache.getOrRefresh('CAM01', reference('/CAM01/b.jpg'));

    expect(result.bytes.toString()).toBe('jpeg-b');
    expect(result.reference.remote_url).toBe(`${PHOTO_HOST}/CAM01/b.jpg`);
    expect(cache.peek('CAM01')?.toString()).toBe('jpeg-b');
  });

  it('should serve the previous bytes with the error when a refresh is forbidden', async () => {
    nock(PHOTO_HOST)
      .get('/CAM01/a.jpg').reply(200, Buffer.from('jpeg-a'))
      .get('/CAM01/b.jpg').reply(403);
    const first = reference('/CAM01/a.jpg');

    await cache.getOrRefresh('CAM01', first);
    const result = await cache.getOrRefresh('CAM01', reference('/CAM01/b.jpg'));

    expect(result.bytes.toString()).toBe('jpeg-a');
    expect(result.reference).toBe(first);
    expect(result.error).toBeInstanceOf(FetchError);
    expect(result.error).toMatchObject({ kind: 'Forbidden', status: 403 });
    expect(cache.peek('CAM01')?.toString()).toBe('jpeg-a');
    expect(mockLogger.warn).toHaveBeenCalledWith('Photo for CAM01: HTTP 403; serving previously cached photo.');
  });

  it('should throw when the download fails and nothing is cached', async () => {
    nock(PHOTO_HOST).get('/CAM01/a.jpg').reply(404);

    const error = await cache.getOrRefresh('CAM01', reference('/CAM01/a.jpg')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ kind: 'Gone', status: 404, message: 'Photo for CAM01: HTTP 404' });
    expect(cache.peek('CAM01')).toBeUndefined();
  });

  it('should map a connection failure to NetworkError', async () => {
    nock(PHOTO_HOST).get('/CAM01/a.jpg').replyWithError('connect ECONNREFUSED');

    await expect(cache.getOrRefresh('CAM01', reference('/CAM01/a.jpg'))).rejects.toMatchObject({
      kind: 'NetworkError',
    });
  });
});
