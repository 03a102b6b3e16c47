/**
 * Model Candidate
 *
 * One generation endpoint: the provider's model name plus the API tier it is
 * served from. Written `id@apiVersion` in configuration.
 */

export interface ModelCandidate {
  /** Provider model name without the `models/` prefix (e.g. "gemini-1.5-flash") */
  id: string;

  /** API tier (e.g. "v1", "v1beta") */
  apiVersion: string;
}

/**
 * How the ordered candidate list is produced
 */
export type CandidateMode = 'static' | 'discovery';

export const DEFAULT_API_VERSION = 'v1beta';

/**
 * Stable label used in logs and diagnostics
 */
export function candidateLabel(candidate: ModelCandidate): string {
  return `${candidate.id}@${candidate.apiVersion}`;
}

/**
 * Parse a single `id[@apiVersion]` token
 */
export function parseCandidate(token: string): ModelCandidate | null {
  const trimmed = token.trim();
  if (!trimmed) return null;

  const at = trimmed.lastIndexOf('@');
  const rawId = at === -1 ? trimmed : trimmed.slice(0, at);
  const apiVersion = at === -1 ? DEFAULT_API_VERSION : trimmed.slice(at + 1).trim();
  const id = rawId.trim().replace(/^models\//, '');

  if (!id || !apiVersion) return null;
  return { id, apiVersion };
}

/**
 * Parse a comma-separated candidate list, dropping blank or invalid entries
 */
export function parseCandidateList(value: string): ModelCandidate[] {
  const candidates: ModelCandidate[] = [];
  for (const token of value.split(',')) {
    const candidate = parseCandidate(token);
    if (candidate) candidates.push(candidate);
  }
  return candidates;
}
