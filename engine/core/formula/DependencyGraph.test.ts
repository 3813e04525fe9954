/**
 * DependencyGraph Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DependencyGraph } from './DependencyGraph.js';
import { cellKey } from '../types/index.js';

const A1 = cellKey(0, 0);
const B1 = cellKey(0, 1);
const C1 = cellKey(0, 2);
const A2 = cellKey(1, 0);
const D1 = cellKey(0, 3);

describe('DependencyGraph', () => {
  let graph: DependencyGraph;

  beforeEach(() => {
    graph = new DependencyGraph();
  });

  describe('setPrecedents', () => {
    it('should keep dependents as the inverse of precedents', () => {
      graph.setPrecedents(C1, [A1, B1]);

      expect(graph.getPrecedents(C1)).toEqual([A1, B1]);
      expect(graph.getDependents(A1)).toEqual([C1]);
      expect(graph.getDependents(B1)).toEqual([C1]);
    });

    it('should diff against the previous set and return it', () => {
      graph.setPrecedents(C1, [A1, B1]);
      const previous = graph.setPrecedents(C1, [B1, A2]);

      expect([...previous].sort()).toEqual([A1, B1].sort());
      expect(graph.getDependents(A1)).toEqual([]);
      expect(graph.getDependents(A2)).toEqual([C1]);
    });

    it('should drop nodes left without edges', () => {
      graph.setPrecedents(C1, [A1]);
      graph.setPrecedents(C1, []);

      expect(graph.getStats()).toEqual({ totalCells: 0, totalEdges: 0, formulaCells: 0 });
    });
  });

  describe('getAllDependents', () => {
    it('should follow dependents transitively in row-major order', () => {
      graph.setPrecedents(B1, [A1]);
      graph.setPrecedents(A2, [B1]);
      graph.setPrecedents(C1, [A1]);

      expect(graph.getAllDependents(A1)).toEqual([B1, C1, A2]);
    });
  });

  describe('findCycle', () => {
    it('should return null for acyclic graphs', () => {
      graph.setPrecedents(B1, [A1]);
      expect(graph.findCycle(B1)).toBeNull();
    });

    it('should report the path back to the start', () => {
      graph.setPrecedents(A1, [B1]);
      graph.setPrecedents(B1, [C1]);
      graph.setPrecedents(C1, [A1]);

      expect(graph.findCycle(C1)).toEqual([C1, B1, A1]);
    });

    it('should detect self references', () => {
      graph.setPrecedents(A1, [A1]);
      expect(graph.findCycle(A1)).toEqual([A1]);
    });

    it('should walk long chains without recursion', () => {
      const length = 30000;
      for (let row = 1; row < length; row++) {
        graph.setPrecedents(cellKey(row, 0), [cellKey(row - 1, 0)]);
      }
      expect(graph.findCycle(A1)).toBeNull();

      graph.setPrecedents(A1, [cellKey(length - 1, 0)]);
      const cycle = graph.findCycle(A1);
      expect(cycle).toHaveLength(length);
      expect(cycle?.[0]).toBe(A1);
      expect(cycle?.[length - 1]).toBe(cellKey(length - 1, 0));
    });
  });

  describe('getCalculationOrder', () => {
    it('should order a diamond with row-major tie-breaks', () => {
      // B1 = A1, C1 = A1, D1 = B1 + C1
      graph.setPrecedents(B1, [A1]);
      graph.setPrecedents(C1, [A1]);
      graph.setPrecedents(D1, [B1, C1]);

      expect(graph.getCalculationOrder([D1, C1, B1, A1])).toEqual({
        order: [A1, B1, C1, D1],
        cyclic: [],
      });
    });

    it('should ignore precedents outside the set', () => {
      graph.setPrecedents(B1, [A1]);
      expect(graph.getCalculationOrder([B1]).order).toEqual([B1]);
    });

    it('should separate cells caught on a cycle', () => {
      graph.setPrecedents(A1, [B1]);
      graph.setPrecedents(B1, [A1]);
      graph.setPrecedents(C1, [B1]);

      expect(graph.getCalculationOrder([A1, B1, C1, A2])).toEqual({
        order: [A2],
        cyclic: [A1, B1, C1],
      });
    });
  });

  it('should count cells and edges', () => {
    graph.setPrecedents(C1, [A1, B1]);
    graph.setPrecedents(D1, [C1]);

    expect(graph.getStats()).toEqual({ totalCells: 4, totalEdges: 3, formulaCells: 2 });

    graph.clear();
    expect(graph.getPrecedents(C1)).toEqual([]);
  });
});
