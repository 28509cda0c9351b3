import type { CornerConvention } from './types/geo';
import { TileMapError } from './errors';

export interface TileMapConfig {
  verbose: boolean;
  cornerConvention: CornerConvention;
}

export const CORNER_CONVENTIONS: readonly CornerConvention[] = ['literal', 'corrected'];

export const isCornerConvention = (value: string): value is CornerConvention =>
  CORNER_CONVENTIONS.some(c => c === value);

// TILEMAP_VERBOSE=1|true turns on library logging
export const readVerbose = (env: NodeJS.ProcessEnv = process.env): boolean =>
  ['1', 'true'].includes((env.TILEMAP_VERBOSE || '').toLowerCase());

// TILEMAP_CORNER_CONVENTION=literal|corrected picks the default for corner queries
export function readCornerConvention(env: NodeJS.ProcessEnv = process.env): CornerConvention {
  const convention = (env.TILEMAP_CORNER_CONVENTION || 'literal').trim().toLowerCase();
  if (!isCornerConvention(convention)) {
    throw new TileMapError(`Invalid TILEMAP_CORNER_CONVENTION "${convention}" (expected ${CORNER_CONVENTIONS.join(' or ')})`);
  }
  return convention;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TileMapConfig {
  return { verbose: readVerbose(env), cornerConvention: readCornerConvention(env) };
}
