import type { DeploymentState, StatusPreset } from './types';

export function resolveState(preset: StatusPreset, buildStatus: string | undefined): DeploymentState {
  if (preset !== 'auto') {
    return preset;
  }
  return buildStatus === '0' ? 'success' : 'failure';
}

export function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Falls back to the resolved state ("Success", "Failure", ...) when no
 * description was configured.
 */
export function resolveDescription(
  description: string | undefined,
  preset: StatusPreset,
  buildStatus: string | undefined
): string {
  if (description) {
    return description;
  }
  return titleCase(resolveState(preset, buildStatus));
}
