/**
 * Remapping parsing and aggregation
 *
 * Remappings are collected from four places, in this order:
 * library auto-discovery, explicit entries, the newline-delimited
 * environment override, and `remappings.txt` at the project root.
 * The combined list is sorted and exact duplicates are dropped.
 * Entries that share a prefix but point elsewhere are all kept.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import { ResolutionError } from './errors.js';
import type { Remapping, RemappingDiscovery, ResolverLogger } from './schema.js';

export const REMAPPINGS_FILENAME = 'remappings.txt';

export type RemappingSource = 'environment' | typeof REMAPPINGS_FILENAME;

/**
 * Parse a single `prefix=target` entry
 */
export function parseRemapping(text: string): Remapping {
  const separator = text.indexOf('=');
  if (separator === -1) {
    throw malformed(text);
  }

  const prefix = text.slice(0, separator);
  const target = text.slice(separator + 1);
  if (!prefix.trim() || !target.trim()) {
    throw malformed(text);
  }

  return { prefix, target };
}

export function formatRemapping(remapping: Remapping): string {
  return `${remapping.prefix}=${remapping.target}`;
}

export function compareRemappings(a: Remapping, b: Remapping): number {
  return compareStrings(a.prefix, b.prefix) || compareStrings(a.target, b.target);
}

/**
 * Sort and drop exact `(prefix, target)` duplicates
 */
export function dedupeRemappings(remappings: Remapping[]): Remapping[] {
  const sorted = remappings.map(({ prefix, target }) => ({ prefix, target })).sort(compareRemappings);
  return sorted.filter((remapping, i) => i === 0 || compareRemappings(sorted[i - 1], remapping) !== 0);
}

/**
 * Parse newline-separated remappings, skipping empty lines
 */
export function parseRemappingLines(text: string, source: RemappingSource): Remapping[] {
  return text
    .split('\n')
    .map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line))
    .filter((line) => line.length > 0)
    .map((line) => {
      try {
        return parseRemapping(line);
      } catch (error) {
        if (error instanceof ResolutionError) {
          throw new ResolutionError('MalformedRemapping', `${error.message} (from ${source})`, {
            input: line,
          });
        }
        throw error;
      }
    });
}

/**
 * Read `remappings.txt` from the root. Anything other than a regular file
 * at that path contributes nothing.
 */
export function readRemappingsFile(root: string): Remapping[] {
  const filepath = join(root, REMAPPINGS_FILENAME);
  if (!existsSync(filepath) || !statSync(filepath).isFile()) {
    return [];
  }
  return parseRemappingLines(readFileSync(filepath, 'utf-8'), REMAPPINGS_FILENAME);
}

export interface AggregateRemappingsInput {
  root: string;
  libraryPaths: string[];
  remappings?: Remapping[];
  remappingsEnv?: string;
}

/**
 * Collect remappings from every source into one sorted, duplicate-free list
 */
export function aggregateRemappings(
  input: AggregateRemappingsInput,
  discovery: RemappingDiscovery,
  logger?: ResolverLogger
): Remapping[] {
  const collected: Remapping[] = input.libraryPaths.flatMap((lib) => discovery.discover(lib));
  logger?.debug(`Discovered ${collected.length} remapping(s) from library paths`);

  if (input.remappings) {
    collected.push(...input.remappings);
  }

  if (input.remappingsEnv !== undefined) {
    collected.push(...parseRemappingLines(input.remappingsEnv, 'environment'));
  }

  const fromFile = readRemappingsFile(input.root);
  if (fromFile.length > 0) {
    logger?.debug(`Read ${fromFile.length} remapping(s) from ${REMAPPINGS_FILENAME}`);
  }
  collected.push(...fromFile);

  const remappings = dedupeRemappings(collected);
  warnOnSharedPrefixes(remappings, logger);
  return remappings;
}

function warnOnSharedPrefixes(remappings: Remapping[], logger?: ResolverLogger): void {
  if (!logger) return;

  for (let i = 1; i < remappings.length; i++) {
    if (remappings[i].prefix === remappings[i - 1].prefix) {
      logger.warn(`Multiple remappings for prefix "${remappings[i].prefix}"`, {
        targets: remappings.filter((r) => r.prefix === remappings[i].prefix).map((r) => r.target),
      });
      // skip the rest of this prefix group
      while (i + 1 < remappings.length && remappings[i + 1].prefix === remappings[i].prefix) i++;
    }
  }
}

function malformed(text: string): ResolutionError {
  return new ResolutionError('MalformedRemapping', `could not parse remapping: ${text}`, {
    input: text,
  });
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
