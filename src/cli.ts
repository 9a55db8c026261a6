#!/usr/bin/env node
/**
 * Build an optimized route map from a locations file
 *
 * Usage: route-map <locations.json> [output.html]
 */

import { readFile } from 'fs/promises';
import { AppConfig, config } from './config/environment';
import { InvalidLocationsError } from './errors/RouteErrors';
import { RouteSummary } from './interfaces/Route';
import { parseLocations } from './dtos/route/build-route.request';
import { RouteBuilder } from './services/route/routeBuilder';
import { RoutingService, createRoutingService } from './services/routing';

export const USAGE = 'Usage: route-map <locations.json> [output.html]';

async function readLocationsFile(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, 'utf-8');
  try {
    const data: unknown = JSON.parse(content);
    return data;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new InvalidLocationsError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    throw error;
  }
}

export async function runCli(
  args: string[],
  appConfig: AppConfig = config,
  routing?: RoutingService
): Promise<RouteSummary> {
  const [inputPath, outputPath = appConfig.outputFile] = args;
  if (!inputPath) {
    throw new InvalidLocationsError(USAGE);
  }

  const locations = parseLocations(await readLocationsFile(inputPath));

  // Ctrl+C abandons the build before anything is written
  const abort = new AbortController();
  const onInterrupt = () => abort.abort();
  process.once('SIGINT', onInterrupt);

  try {
    const builder = new RouteBuilder(locations, {
      routing: routing ?? createRoutingService(appConfig.routing),
      strategy: appConfig.strategy,
      zoomStart: appConfig.zoomStart,
      signal: abort.signal,
    });
    return await builder.build(outputPath);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).catch((error: unknown) => {
    if (error instanceof Error) {
      console.error(`${error.name}: ${error.message}`);
    } else {
      console.error('Route build failed:', error);
    }
    process.exit(1);
  });
}
