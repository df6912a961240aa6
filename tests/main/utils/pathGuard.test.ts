import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { isInside, resolveWithin } from '../../../src/main/utils/pathGuard';
import { PathTraversalError } from '../../../src/main/services/errors';

const ROOT = path.resolve('/data/stems');

describe('pathGuard', () => {
  describe('isInside', () => {
    it('should accept descendants', () => {
      expect(isInside(ROOT, path.join(ROOT, 'a'))).toBe(true);
      expect(isInside(ROOT, path.join(ROOT, 'a', 'b.wav'))).toBe(true);
    });

    it('should reject the root itself', () => {
      expect(isInside(ROOT, ROOT)).toBe(false);
    });

    it('should reject siblings and parents', () => {
      expect(isInside(ROOT, path.resolve('/data'))).toBe(false);
      expect(isInside(ROOT, path.resolve('/data/stems-other/a'))).toBe(false);
      expect(isInside(ROOT, path.join(ROOT, '..', 'x'))).toBe(false);
    });
  });

  describe('resolveWithin', () => {
    it('should join segments under the root', () => {
      expect(resolveWithin(ROOT, 'Artist - Title_2cf24dba', 'vocals.wav')).toBe(
        path.join(ROOT, 'Artist - Title_2cf24dba', 'vocals.wav'),
      );
    });

    it('should throw PathTraversalError for escaping segments', () => {
      expect(() => resolveWithin(ROOT, '..', 'etc')).toThrow(PathTraversalError);
      expect(() => resolveWithin(ROOT, path.resolve('/tmp/x'))).toThrow(PathTraversalError);
      expect(() => resolveWithin(ROOT, '')).toThrow(PathTraversalError);
    });
  });
});
