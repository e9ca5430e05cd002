/**
 * Tests for the document parsing client
 */

import { describe, it, expect, vi } from 'vitest';
import type { AxiosInstance } from 'axios';
import FormData from 'form-data';
import { DoclingParser, isPlainText } from '../docling.js';
import { ParseError, ServiceStartFailedError } from '../../errors/index.js';
import { httpError } from '../../test-utils/http-errors.js';

function parserWith(post: ReturnType<typeof vi.fn>, beforeRemoteParse?: () => Promise<unknown>): DoclingParser {
  return new DoclingParser({
    url: 'http://localhost:5001',
    timeoutMs: 1000,
    retries: 1,
    retryBackoffMs: 0,
    beforeRemoteParse,
    http: { post } as unknown as AxiosInstance,
  });
}

describe('isPlainText', () => {
  it('matches text formats case-insensitively', () => {
    expect(isPlainText('/docs/README.MD')).toBe(true);
    expect(isPlainText('/docs/notes.txt')).toBe(true);
    expect(isPlainText('/docs/report.pdf')).toBe(false);
  });
});

describe('DoclingParser', () => {
  it('decodes plain text locally without starting docling', async () => {
    const post = vi.fn();
    const before = vi.fn(async () => 'healthy');
    const parser = parserWith(post, before);

    const text = await parser.parse({ path: '/docs/a.txt', content: Buffer.from('\ufeffhello world') });

    expect(text).toBe('hello world');
    expect(post).not.toHaveBeenCalled();
    expect(before).not.toHaveBeenCalled();
  });

  it('converts other formats through docling', async () => {
    const post = vi.fn().mockResolvedValue({ data: { document: { md_content: '# Report\n\nBody' } } });
    const before = vi.fn(async () => 'healthy');
    const parser = parserWith(post, before);

    const text = await parser.parse({ path: '/docs/report.pdf', content: Buffer.from('%PDF-1.7') });

    expect(text).toBe('# Report\n\nBody');
    expect(before).toHaveBeenCalledTimes(1);
    expect(post).toHaveBeenCalledTimes(1);
    const [url, body] = post.mock.calls[0] ?? [];
    expect(url).toBe('/v1/convert/file');
    expect(body).toBeInstanceOf(FormData);
  });

  it('retries a transient failure', async () => {
    const post = vi
      .fn()
      .mockRejectedValueOnce(httpError(502))
      .mockResolvedValueOnce({ data: { document: { md_content: 'ok' } } });
    const parser = parserWith(post);

    await expect(parser.parse({ path: '/docs/x.docx', content: Buffer.from('PK') })).resolves.toBe('ok');
    expect(post).toHaveBeenCalledTimes(2);
  });

  it('wraps conversion failures as ParseError', async () => {
    const post = vi.fn().mockRejectedValue(httpError(415, { detail: 'Unsupported format' }));
    const parser = parserWith(post);

    const error = await parser.parse({ path: '/docs/x.bin', content: Buffer.from([0]) }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toHaveProperty('message', 'Failed to parse /docs/x.bin: HTTP 415: Unsupported format');
  });

  it('rejects a response without markdown', async () => {
    const post = vi.fn().mockResolvedValue({ data: { status: 'failure' } });
    const parser = parserWith(post);

    await expect(parser.parse({ path: '/docs/x.pdf', content: Buffer.from('') })).rejects.toBeInstanceOf(
      ParseError
    );
  });

  it('lets a service start failure propagate', async () => {
    const post = vi.fn();
    const parser = parserWith(post, async () => {
      throw new ServiceStartFailedError('docling', 3, 'connection refused');
    });

    await expect(parser.parse({ path: '/docs/x.pdf', content: Buffer.from('') })).rejects.toBeInstanceOf(
      ServiceStartFailedError
    );
    expect(post).not.toHaveBeenCalled();
  });
});
