/**
 * =============================================================================
 * CLI - File In / File Out Tests
 * =============================================================================
 *
 * Runs the CLI against a temporary directory and a fake fetch.
 * =============================================================================
 */

import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runCli } from '../cli';
import { ErrorCode } from '../core';
import { createFakeFetch, geocoderReply, routingReply, testConfig } from './helpers/fake-fetch';

jest.mock('../shared/services/logger.service', () => ({
  ...jest.requireActual('../shared/services/logger.service'),
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
  logError: jest.fn(),
}));

const fetchFn = createFakeFetch((url) =>
  url.startsWith('https://geocode-maps.yandex.ru') ? geocoderReply('37.5 55.5', 'Reverse addr') : routingReply(2500, 150)
);

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'route-calc-'));
  fetchFn.mockClear();
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function writeJson(name: string, data: unknown): Promise<void> {
  await writeFile(join(dir, name), JSON.stringify(data), 'utf-8');
}

async function readJson(name: string): Promise<unknown> {
  return JSON.parse(await readFile(join(dir, name), 'utf-8'));
}

describe('runCli', () => {
  it('writes a single route result to output.json by default', async () => {
    await writeJson('input.json', { from: { lat: 1, lon: 2, address: 'P' }, to: { address: 'Q' } });

    const code = await runCli([], { config: testConfig(), fetchFn, cwd: dir });

    expect(code).toBe(0);
    expect(await readJson('output.json')).toEqual({
      success: true,
      from: { address: 'P', lat: 1, lon: 2 },
      to: { address: 'Q', lat: 55.5, lon: 37.5 },
      distance_meters: 2500,
      distance_km: 2.5,
      duration_seconds: 150,
      duration_minutes: 2.5,
    });
  });

  it('writes batch results to output_batch.json by default', async () => {
    await writeJson('routes.json', {
      routes: [
        { id: 'r1', loading: { lat: 1, lon: 2 }, unloading: { address: 'Q' } },
        { id: 'r2', loading: {}, unloading: {} },
      ],
    });

    const code = await runCli(['routes.json'], { config: testConfig(), fetchFn, cwd: dir });

    expect(code).toBe(0);
    expect(await readJson('output_batch.json')).toEqual({
      routes: [
        {
          id: 'r1',
          loading: { address: 'Reverse addr', lat: '1.000000', lon: '2.000000' },
          unloading: { address: 'Q', lat: '55.500000', lon: '37.500000' },
          distance_m: 2500,
          duration_s: 150,
          error: null,
        },
        {
          id: 'r2',
          loading: {},
          unloading: {},
          distance_m: null,
          duration_s: null,
          error: '[r2 / loading] Neither coordinates nor address given',
        },
      ],
    });
  });

  it('writes an error-flagged output and exits 1 when a single route fails', async () => {
    await writeJson('input.json', { from: { address: 'P' }, to: { lat: 1, lon: 2 } });

    const code = await runCli(['input.json', 'result.json'], {
      config: testConfig({ ROUTING_API_KEY: '' }),
      fetchFn,
      cwd: dir,
    });

    expect(code).toBe(1);
    const output = await readJson('result.json');
    expect(output).toMatchObject({
      success: false,
      error: {
        code: ErrorCode.CONFIGURATION_MISSING,
        message: 'ROUTING_API_KEY is not set (required for route calculation)',
      },
    });
  });

  it('exits 1 without output when the input file is missing', async () => {
    const code = await runCli(['missing.json'], { config: testConfig(), fetchFn, cwd: dir });

    expect(code).toBe(1);
    expect(fetchFn).not.toHaveBeenCalled();
    await expect(readFile(join(dir, 'output.json'), 'utf-8')).rejects.toThrow();
  });

  it('exits 1 when the input is not JSON', async () => {
    await writeFile(join(dir, 'input.json'), '{ not json', 'utf-8');

    expect(await runCli([], { config: testConfig(), fetchFn, cwd: dir })).toBe(1);
  });
});
