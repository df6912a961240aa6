/**
 * Containment checks for paths computed from tags, hashes and backend ids.
 */

import * as path from 'path';
import { PathTraversalError } from '../services/errors';

/**
 * True if `candidate` resolves to a location strictly inside `root`.
 */
export function isInside(root: string, candidate: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(candidate));
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * Joins segments onto `root` and returns the absolute result.
 * @throws PathTraversalError if the result is not inside `root`
 */
export function resolveWithin(root: string, ...segments: string[]): string {
  const resolvedRoot = path.resolve(root);
  const candidate = path.resolve(resolvedRoot, ...segments);
  if (!isInside(resolvedRoot, candidate)) {
    throw new PathTraversalError(
      `Path "${segments.join('/')}" escapes ${resolvedRoot}`,
      resolvedRoot,
      candidate,
    );
  }
  return candidate;
}
