import { describe, it, expect } from 'vitest';
import {
  compareVersions,
  findVersionToken,
  isVersionInRange,
  normalizeVersion,
  parseNumericVersion,
} from '../src/ingestion/normalizers/version.js';

describe('Version normalization', () => {
  describe('normalizeVersion', () => {
    it('should strip a leading v', () => {
      expect(normalizeVersion('v1.101.0')).toBe('1.101.0');
    });

    it('should strip a refs/tags/ prefix', () => {
      expect(normalizeVersion('refs/tags/v1.101.0')).toBe('1.101.0');
    });

    it('should turn underscores between digits into dots', () => {
      expect(normalizeVersion('v1_101')).toBe('1.101');
    });

    it('should strip release and version words', () => {
      expect(normalizeVersion('release-2.0')).toBe('2.0');
      expect(normalizeVersion('version 1.5')).toBe('1.5');
    });

    it('should map equivalent identifiers to the same version', () => {
      const forms = ['v1.101.0', '1.101.0', 'refs/tags/v1.101.0', ' V1.101.0 '];
      expect(new Set(forms.map(normalizeVersion))).toEqual(new Set(['1.101.0']));
    });

    it('should keep non-numeric tags as written', () => {
      expect(normalizeVersion('nightly-2025')).toBe('nightly-2025');
    });

    it('should return null when nothing usable remains', () => {
      expect(normalizeVersion('')).toBeNull();
      expect(normalizeVersion('---')).toBeNull();
      expect(normalizeVersion(null)).toBeNull();
      expect(normalizeVersion(undefined)).toBeNull();
    });
  });

  describe('parseNumericVersion', () => {
    it('should split dotted numeric versions', () => {
      expect(parseNumericVersion('2.0.3')).toEqual([2, 0, 3]);
    });

    it('should reject versions with non-numeric parts', () => {
      expect(parseNumericVersion('1.2.x')).toBeNull();
    });
  });

  describe('compareVersions', () => {
    it('should compare components numerically', () => {
      expect(compareVersions('1.10', '1.9')).toBe(1);
      expect(compareVersions('1.99', '1.100')).toBe(-1);
    });

    it('should treat missing components as zero', () => {
      expect(compareVersions('1.101', '1.101.0')).toBe(0);
    });

    it('should order numeric versions before other tags', () => {
      expect(compareVersions('1.0', 'beta')).toBe(-1);
      expect(compareVersions('beta', '1.0')).toBe(1);
    });
  });

  describe('isVersionInRange', () => {
    it('should include both bounds', () => {
      expect(isVersionInRange('1.100', '1.100', '1.101')).toBe(true);
      expect(isVersionInRange('1.101', '1.100', '1.101')).toBe(true);
    });

    it('should accept bounds in either order', () => {
      expect(isVersionInRange('1.100', '1.101', '1.99')).toBe(true);
    });

    it('should exclude versions outside the range', () => {
      expect(isVersionInRange('1.102', '1.99', '1.101')).toBe(false);
      expect(isVersionInRange('1.98', '1.99', '1.101')).toBe(false);
    });
  });

  describe('findVersionToken', () => {
    it('should find the first dotted version in text', () => {
      expect(findVersionToken('Release v2.3.1 notes (supersedes 2.3.0)')).toBe('2.3.1');
    });

    it('should return null when the text has no version', () => {
      expect(findVersionToken('Changelog')).toBeNull();
    });
  });
});
