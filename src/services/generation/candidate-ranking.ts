import { HEAVY_MODEL_TOKENS, LIGHT_MODEL_TOKENS } from '../../constants/pipeline-constants.js';
import type { ModelCandidate } from '../../models/model-candidate.js';

/**
 * Capacity tier inferred from the model name; lower is preferred
 */
export enum ModelTier {
  LIGHT = 0,
  STANDARD = 1,
  HEAVY = 2
}

export interface CandidatePreference {
  /** Major version from the name; 0 when the name carries none */
  majorVersion: number;
  tier: ModelTier;
}

function nameTokens(id: string): string[] {
  return id.toLowerCase().split(/[-_]/);
}

/**
 * Derive the preference key of a model name
 *
 * @example
 * preferenceOf('gemini-2.0-flash')  // { majorVersion: 2, tier: LIGHT }
 * preferenceOf('gemini-1.5-pro')    // { majorVersion: 1, tier: HEAVY }
 * preferenceOf('gemini-pro')        // { majorVersion: 0, tier: HEAVY }
 * preferenceOf('gemini-exp-1206')   // { majorVersion: 0, tier: STANDARD }
 */
export function preferenceOf(id: string): CandidatePreference {
  const tokens = nameTokens(id);

  // Version follows the family name: gemini-<version>-<variant>
  const versionToken = tokens[1] ?? '';
  const majorVersion = /^\d+(\.\d+)*$/.test(versionToken) ? parseInt(versionToken, 10) : 0;

  let tier = ModelTier.STANDARD;
  if (tokens.some((token) => LIGHT_MODEL_TOKENS.some((marker) => marker === token))) {
    tier = ModelTier.LIGHT;
  } else if (tokens.some((token) => HEAVY_MODEL_TOKENS.some((marker) => marker === token))) {
    tier = ModelTier.HEAVY;
  }

  return { majorVersion, tier };
}

/**
 * Order: newer major version first, then lighter tier. Ties keep input order.
 */
export function compareCandidates(a: ModelCandidate, b: ModelCandidate): number {
  const left = preferenceOf(a.id);
  const right = preferenceOf(b.id);
  if (left.majorVersion !== right.majorVersion) {
    return right.majorVersion - left.majorVersion;
  }
  return left.tier - right.tier;
}

/**
 * Sorted copy of the candidates (Array.prototype.sort is stable)
 */
export function rankCandidates(candidates: readonly ModelCandidate[]): ModelCandidate[] {
  return [...candidates].sort(compareCandidates);
}
