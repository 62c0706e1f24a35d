import { describe, it, expect } from 'vitest';
import {
  applyLayer,
  fillGaps,
  getByPath,
  isPathFree,
  setByPath,
  splitPath,
  toVariableContext,
} from '../context.js';
import { ParseError, ValidationError } from '../../errors.js';

describe('VariableContext', () => {
  describe('getByPath', () => {
    const context = { org: 'acme', project: { board: 'Engineering', id: 7 } };

    it('should read top-level and nested leaves', () => {
      expect(getByPath(context, 'org')).toBe('acme');
      expect(getByPath(context, 'project.board')).toBe('Engineering');
      expect(getByPath(context, 'project.id')).toBe(7);
    });

    it('should return the nested mapping for an intermediate path', () => {
      expect(getByPath(context, 'project')).toEqual({ board: 'Engineering', id: 7 });
    });

    it('should return undefined for missing segments', () => {
      expect(getByPath(context, 'missing')).toBeUndefined();
      expect(getByPath(context, 'project.missing')).toBeUndefined();
    });

    it('should return undefined when an intermediate segment is a scalar', () => {
      expect(getByPath(context, 'org.name')).toBeUndefined();
    });

    it('should not read inherited properties', () => {
      expect(getByPath(context, 'toString')).toBeUndefined();
    });
  });

  describe('isPathFree', () => {
    const context = { org: 'acme', project: { board: 'Engineering' } };

    it('should accept absent paths under mappings', () => {
      expect(isPathFree(context, 'board')).toBe(true);
      expect(isPathFree(context, 'project.id')).toBe(true);
      expect(isPathFree(context, 'team.lead.name')).toBe(true);
    });

    it('should refuse paths that are already set', () => {
      expect(isPathFree(context, 'org')).toBe(false);
      expect(isPathFree(context, 'project')).toBe(false);
    });

    it('should refuse paths under a scalar', () => {
      expect(isPathFree(context, 'org.name')).toBe(false);
      expect(isPathFree(context, 'project.board.id')).toBe(false);
    });
  });

  describe('setByPath', () => {
    it('should create intermediate mappings', () => {
      expect(setByPath({}, 'a.b.c', 'x')).toEqual({ a: { b: { c: 'x' } } });
    });

    it('should replace a scalar found at an intermediate segment', () => {
      expect(setByPath({ a: 'scalar' }, 'a.b', 'x')).toEqual({ a: { b: 'x' } });
    });

    it('should keep sibling keys', () => {
      const result = setByPath({ a: { keep: 1 }, other: true }, 'a.b', 'x');
      expect(result).toEqual({ a: { keep: 1, b: 'x' }, other: true });
    });

    it('should leave the input untouched', () => {
      const input = { a: { b: 'old' } };
      setByPath(input, 'a.b', 'new');
      expect(input).toEqual({ a: { b: 'old' } });
    });

    it('should store __proto__ as an own key', () => {
      const result = setByPath({}, '__proto__.polluted', 'yes');
      expect(Object.hasOwn(result, '__proto__')).toBe(true);
      expect(getByPath(result, '__proto__.polluted')).toBe('yes');
      expect(Object.hasOwn(Object.prototype, 'polluted')).toBe(false);
    });

    it('should reject empty path segments', () => {
      expect(() => setByPath({}, 'a..b', 'x')).toThrow(ValidationError);
      expect(() => setByPath({}, '', 'x')).toThrow('invalid variable path ""');
    });
  });

  describe('splitPath', () => {
    it('should split dotted paths', () => {
      expect(splitPath('ore.status.field_id')).toEqual(['ore', 'status', 'field_id']);
    });
  });

  describe('applyLayer', () => {
    it('should let the overlay win on leaves and merge nested mappings', () => {
      const base = { org: 'base', project: { board: 'Eng', id: 1 } };
      const overlay = { org: 'top', project: { id: 2 } };

      expect(applyLayer(base, overlay)).toEqual({ org: 'top', project: { board: 'Eng', id: 2 } });
    });

    it('should replace a scalar with a mapping from the overlay', () => {
      expect(applyLayer({ a: 'x' }, { a: { b: 'y' } })).toEqual({ a: { b: 'y' } });
    });

    it('should not share nested objects with its inputs', () => {
      const overlay = { nested: { value: 'x' } };
      const result = applyLayer({}, overlay);

      expect(result.nested).toEqual(overlay.nested);
      expect(result.nested).not.toBe(overlay.nested);
    });
  });

  describe('fillGaps', () => {
    it('should only add keys that are absent', () => {
      const result = fillGaps({ org: 'acme', nested: { a: '1' } }, { org: 'default', board: 'Eng', nested: { a: '0', b: '2' } });

      expect(result).toEqual({ org: 'acme', board: 'Eng', nested: { a: '1', b: '2' } });
    });
  });

  describe('toVariableContext', () => {
    it('should keep scalars and nest mappings', () => {
      expect(toVariableContext({ a: 'x', b: 2, c: false, d: { e: 'y' } })).toEqual({
        a: 'x',
        b: 2,
        c: false,
        d: { e: 'y' },
      });
    });

    it('should join scalar lists with commas and drop nulls', () => {
      expect(toVariableContext({ labels: ['bug', 'docs', 3], empty: null })).toEqual({
        labels: 'bug,docs,3',
      });
    });

    it('should treat null documents as empty', () => {
      expect(toVariableContext(null)).toEqual({});
    });

    it('should reject a non-mapping document', () => {
      expect(() => toVariableContext(['a'], 'values.yaml')).toThrow(
        'values.yaml: expected a mapping at the top level'
      );
    });

    it('should reject lists of mappings', () => {
      expect(() => toVariableContext({ items: [{ a: 1 }] }, 'values.yaml')).toThrow(ParseError);
    });
  });
});
