import { InvalidArgumentError } from 'commander';
import { SEARCH_MODES, SEARCH_TYPES } from '../application/dto/SearchRequest.js';
import type { SearchMode } from '../application/dto/SearchRequest.js';
import type { SearchType } from '../domain/ports/SearchBackendPort.js';
import type { DetailLevel, OutputFormat } from './formatters/SearchResultFormatter.js';

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/** --category key=value，可重複；同一 key 的值累加 */
export function collectCategory(value: string, previous: Record<string, string[]>): Record<string, string[]> {
  const eq = value.indexOf('=');
  if (eq <= 0 || eq === value.length - 1) {
    throw new InvalidArgumentError('Expected key=value.');
  }
  const key = value.slice(0, eq).trim();
  const val = value.slice(eq + 1).trim();
  return { ...previous, [key]: [...(previous[key] ?? []), val] };
}

export function parseFormat(value: string): OutputFormat {
  if (value === 'json' || value === 'text') return value;
  throw new InvalidArgumentError('Expected json or text.');
}

export function parseLevel(value: string): DetailLevel {
  if (value === 'brief' || value === 'normal' || value === 'full') return value;
  throw new InvalidArgumentError('Expected brief, normal or full.');
}

export function parseMode(value: string): SearchMode {
  const mode = SEARCH_MODES.find((m) => m === value);
  if (!mode) throw new InvalidArgumentError(`Expected one of: ${SEARCH_MODES.join(', ')}.`);
  return mode;
}

export function parseSearchType(value: string): SearchType {
  const type = SEARCH_TYPES.find((t) => t === value);
  if (!type) throw new InvalidArgumentError(`Expected one of: ${SEARCH_TYPES.join(', ')}.`);
  return type;
}
