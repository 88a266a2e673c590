import { MediaFetchError } from '../clients/errors.js';
import { HttpMediaFetcher, classifyContentType } from '../clients/media-fetcher.js';

describe('classifyContentType', () => {
  it('recognises image and video content types', () => {
    expect(classifyContentType('image/png')).toBe('image');
    expect(classifyContentType('IMAGE/JPEG')).toBe('image');
    expect(classifyContentType('video/mp4')).toBe('video');
    expect(classifyContentType('application/mp4')).toBe('video');
  });

  it('returns null for other content', () => {
    expect(classifyContentType('text/html; charset=utf-8')).toBeNull();
    expect(classifyContentType('')).toBeNull();
  });
});

describe('HttpMediaFetcher', () => {
  it('downloads bytes with the configured timeout', async () => {
    const httpClient = {
      request: jest.fn().mockResolvedValueOnce({
        status: 200,
        data: new Uint8Array([1, 2, 3]).buffer,
        headers: { 'content-type': 'Image/JPEG' },
      }),
    };
    const fetcher = new HttpMediaFetcher({ timeoutMs: 1234, httpClient });

    const media = await fetcher.fetch('https://cdn.example.com/a.jpg');

    expect(media).toEqual({
      url: 'https://cdn.example.com/a.jpg',
      bytes: Buffer.from([1, 2, 3]),
      contentType: 'image/jpeg',
    });
    expect(httpClient.request).toHaveBeenCalledWith(
      expect.objectContaining({
        method: 'GET',
        url: 'https://cdn.example.com/a.jpg',
        responseType: 'arraybuffer',
        timeout: 1234,
      })
    );
  });

  it('lets callers override the timeout per request', async () => {
    const httpClient = {
      request: jest.fn().mockResolvedValueOnce({ status: 200, data: new ArrayBuffer(0), headers: {} }),
    };
    const fetcher = new HttpMediaFetcher({ timeoutMs: 1000, httpClient });

    const media = await fetcher.fetch('https://cdn.example.com/v.mp4', { timeoutMs: 60000 });

    expect(media.contentType).toBe('');
    expect(httpClient.request).toHaveBeenCalledWith(expect.objectContaining({ timeout: 60000 }));
  });

  it('fails on non-2xx responses with the status', async () => {
    const httpClient = {
      request: jest.fn().mockResolvedValueOnce({ status: 404, data: new ArrayBuffer(0), headers: {} }),
    };
    const fetcher = new HttpMediaFetcher({ timeoutMs: 1000, httpClient });

    const failure = fetcher.fetch('https://cdn.example.com/gone.jpg');
    await expect(failure).rejects.toBeInstanceOf(MediaFetchError);
    await expect(failure).rejects.toMatchObject({ status: 404, url: 'https://cdn.example.com/gone.jpg' });
  });

  it('wraps transport errors', async () => {
    const httpClient = {
      request: jest.fn().mockRejectedValueOnce(new Error('timeout of 1000ms exceeded')),
    };
    const fetcher = new HttpMediaFetcher({ timeoutMs: 1000, httpClient });

    await expect(fetcher.fetch('https://cdn.example.com/slow.jpg')).rejects.toThrow(
      'Failed to download media from https://cdn.example.com/slow.jpg: timeout of 1000ms exceeded'
    );
  });
});
