#!/usr/bin/env node
/**
 * =============================================================================
 * ROUTE CALCULATOR - CLI ENTRY
 * =============================================================================
 *
 * Usage:
 *   route-calc [input.json] [output.json]
 *
 * Reads one JSON file, detects single or batch mode, writes one JSON file.
 *
 * ┌──────────┬──────────────────────────┬─────────────────────────────────────┐
 * │ MODE     │ INPUT                    │ OUTPUT (default path)               │
 * ├──────────┼──────────────────────────┼─────────────────────────────────────┤
 * │ single   │ { from, to, ...options } │ output.json, success flag           │
 * │ batch    │ { routes: [...] }        │ output_batch.json, error per route  │
 * └──────────┴──────────────────────────┴─────────────────────────────────────┘
 *
 * Exit code 1 on a fatal error, the output file then holds
 * { success: false, error }. Per-route errors in batch mode are not fatal.
 * =============================================================================
 */

import { readFile, writeFile } from 'fs/promises';
import { resolve } from 'path';
import { AppConfig, config as appConfig } from './config/environment';
import { DEFAULT_FILES, ErrorCode, ValidationError, toAppError } from './core';
import { GeocodingService } from './modules/geocoding/geocoding.service';
import { PointResolver } from './modules/geocoding/point-resolver.service';
import { isBatchInput } from './modules/route-job/route-job.schema';
import { RouteJobService } from './modules/route-job/route-job.service';
import { RoutingService } from './modules/routing';
import { logError, logger } from './shared/services/logger.service';
import { FetchFn } from './shared/utils/http.utils';

export interface CliOptions {
  config?: AppConfig;
  fetchFn?: FetchFn;
  cwd?: string;
}

/**
 * Wire the services from one configuration object
 */
export function createRouteJobService(config: AppConfig, fetchFn: FetchFn = fetch): RouteJobService {
  const geocoder = new GeocodingService(config.geocoder, fetchFn);
  const routing = new RoutingService(config.routing, fetchFn);
  return new RouteJobService(new PointResolver(geocoder), routing);
}

/**
 * Run the CLI with the given positional arguments.
 * Resolves to the process exit code.
 */
export async function runCli(args: string[], options: CliOptions = {}): Promise<number> {
  const config = options.config ?? appConfig;
  const cwd = options.cwd ?? process.cwd();
  const [inputArg, outputArg] = args;
  const inputPath = resolve(cwd, inputArg ?? DEFAULT_FILES.INPUT);

  let input: unknown;
  try {
    input = await readInput(inputPath);
  } catch (error: unknown) {
    logError(`Cannot read ${inputPath}`, error);
    return 1;
  }

  const service = createRouteJobService(config, options.fetchFn);
  const outputPath = resolve(
    cwd,
    outputArg ?? (isBatchInput(input) ? DEFAULT_FILES.BATCH_OUTPUT : DEFAULT_FILES.OUTPUT)
  );
  logger.info(`🚚 Routing profile: ${config.routing.profile}`);

  try {
    const result = await service.run(input);
    await writeOutput(outputPath, result.output);
    logger.info(`Done. Result written to ${outputPath}`);
    return 0;
  } catch (error: unknown) {
    const appError = toAppError(error);
    logError(`Route calculation failed: ${appError.message}`, appError);
    await writeOutput(outputPath, appError.toJSON());
    return 1;
  }
}

async function readInput(path: string): Promise<unknown> {
  const text = await readFile(path, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (error: unknown) {
    throw new ValidationError(
      `${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      [],
      ErrorCode.INPUT_FILE_INVALID
    );
  }
}

async function writeOutput(path: string, data: unknown): Promise<void> {
  await writeFile(path, `${JSON.stringify(data, null, 4)}\n`, 'utf-8');
}

// =============================================================================
// ENTRY
// =============================================================================

if (require.main === module) {
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
    process.exit(1);
  });

  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logError('Fatal error', error);
      process.exitCode = 1;
    });
}
