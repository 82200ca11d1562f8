import * as semver from 'semver';
import type { UpdateType } from './types.js';

/**
 * Classify the jump from `current` to `latest`.
 * Versions that are not semver (pip's `2.3`, `2023.7.22.post1`) are coerced first;
 * anything that still does not compare is `unknown`.
 */
export function determineUpdateType(current: string, latest: string): UpdateType {
  const from = semver.coerce(current);
  const to = semver.coerce(latest);
  if (!from || !to) return 'unknown';

  if (semver.prerelease(latest)) return 'prerelease';

  switch (semver.diff(from, to)) {
    case 'major':
    case 'premajor':
      return 'major';
    case 'minor':
    case 'preminor':
      return 'minor';
    case 'patch':
    case 'prepatch':
      return 'patch';
    case 'prerelease':
      return 'prerelease';
    default:
      return 'unknown';
  }
}
