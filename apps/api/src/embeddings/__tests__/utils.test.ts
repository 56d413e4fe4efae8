import { describe, it, expect } from 'vitest';
import { uniformDimensions } from '../utils.js';

describe('vector utils', () => {
  describe('uniformDimensions', () => {
    it('should return the shared length', () => {
      expect(uniformDimensions([[1, 2], [3, 4]])).toBe(2);
    });

    it('should return 0 for no vectors', () => {
      expect(uniformDimensions([])).toBe(0);
    });

    it('should return null when lengths differ', () => {
      expect(uniformDimensions([[1, 2], [3, 4, 5]])).toBeNull();
    });
  });
});
