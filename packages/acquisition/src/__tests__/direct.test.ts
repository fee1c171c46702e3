import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { MockAgent } from 'undici';
import { TransferError, type AssetDescriptor } from '@mediafetch/core';
import { DEFAULT_USER_AGENT } from '@mediafetch/network';
import { DirectTransferClient } from '../clients/direct.js';
import { createTempDir, removeTempDir } from './helpers.js';

describe('DirectTransferClient', () => {
  let dir: string;
  let mockAgent: MockAgent;
  let sleeps: number[];
  let client: DirectTransferClient;

  const asset = (name: string): AssetDescriptor => ({
    id: name,
    url: `https://cdn.test/media/${name}.jpg`,
    destination: join(dir, 'out', `${name}.jpg`),
    kind: 'image',
  });

  beforeEach(async () => {
    dir = await createTempDir();
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    sleeps = [];
    client = new DirectTransferClient({
      dispatcherFactory: () => mockAgent,
      sleep: async (ms: number) => {
        sleeps.push(ms);
      },
    });
  });

  afterEach(async () => {
    await mockAgent.close();
    await removeTempDir(dir);
  });

  it('should write the body to the destination with only a user agent header', async () => {
    mockAgent
      .get('https://cdn.test')
      .intercept({ path: '/media/a.jpg', method: 'GET', headers: { 'user-agent': DEFAULT_USER_AGENT } })
      .reply(200, 'jpeg bytes');

    await client.transfer(asset('a'), { proxy: null });

    expect(await readFile(join(dir, 'out', 'a.jpg'), 'utf8')).toBe('jpeg bytes');
    expect(await readdir(join(dir, 'out'))).toEqual(['a.jpg']);
  });

  it('should retry server errors with growing delays', async () => {
    const pool = mockAgent.get('https://cdn.test');
    pool.intercept({ path: '/media/b.jpg', method: 'GET' }).reply(503, 'busy').times(2);
    pool.intercept({ path: '/media/b.jpg', method: 'GET' }).reply(200, 'finally');

    await client.transfer(asset('b'), { proxy: null });

    expect(sleeps).toEqual([1000, 2000]);
    expect(await readFile(join(dir, 'out', 'b.jpg'), 'utf8')).toBe('finally');
  });

  it('should give up at once on a missing asset and leave no partial file', async () => {
    mockAgent
      .get('https://cdn.test')
      .intercept({ path: '/media/c.jpg', method: 'GET' })
      .reply(404, 'not here');

    const error = await client.transfer(asset('c'), { proxy: null }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransferError);
    expect(error).toMatchObject({ statusCode: 404, reason: 'HTTP 404' });
    expect(sleeps).toEqual([]);
    expect(await readdir(join(dir, 'out'))).toEqual([]);
  });

  it('should surface the last error after all attempts fail', async () => {
    mockAgent
      .get('https://cdn.test')
      .intercept({ path: '/media/d.jpg', method: 'GET' })
      .reply(500, 'oops')
      .times(3);

    await expect(client.transfer(asset('d'), { proxy: null })).rejects.toThrow('Transfer failed: HTTP 500');
    expect(sleeps).toEqual([1000, 2000]);
  });
});
