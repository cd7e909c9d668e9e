import { describe, it, expect, beforeEach } from 'vitest';
import { Graph, compareNodeKeys } from '@/graph/graph.js';

describe('Graph', () => {
  describe('node operations', () => {
    let graph: Graph<number, number>;

    beforeEach(() => {
      graph = new Graph<number, number>();
    });

    it('should add and remove nodes', () => {
      graph.addNode(1);
      graph.addNode(2);

      expect(graph.hasNode(1)).toBe(true);
      expect(graph.size()).toBe(2);

      graph.removeNode(1);

      expect(graph.hasNode(1)).toBe(false);
      expect(graph.size()).toBe(1);
    });

    it('should treat addNode as idempotent', () => {
      graph.addEdge(1, 2, 5);
      graph.addNode(1);

      expect(graph.size()).toBe(2);
      expect(graph.getNeighbors(1)).toEqual([2]);
    });

    it('should list nodes in insertion order', () => {
      graph.addNode(3);
      graph.addEdge(1, 2, 0);

      expect(graph.nodes()).toEqual([3, 1, 2]);
    });

    it('should ignore removal of a missing node', () => {
      graph.addNode(1);
      graph.removeNode(42);

      expect(graph.size()).toBe(1);
    });

    it('should clear all nodes and edges', () => {
      graph.addEdge(1, 2, 1);
      graph.clear();

      expect(graph.size()).toBe(0);
      expect(graph.getNeighbors(1)).toEqual([]);
    });
  });

  describe('directed edges', () => {
    let graph: Graph<number, number>;

    beforeEach(() => {
      graph = new Graph<number, number>(true);
    });

    it('should create both endpoints when adding an edge', () => {
      graph.addEdge(1, 2, 10);

      expect(graph.hasNode(1)).toBe(true);
      expect(graph.hasNode(2)).toBe(true);
      expect(graph.isDirected).toBe(true);
    });

    it('should not add the reverse direction', () => {
      graph.addEdge(1, 2, 10);

      expect(graph.getNeighbors(1)).toEqual([2]);
      expect(graph.getNeighbors(2)).toEqual([]);
    });

    it('should keep parallel edges as separate entries', () => {
      graph.addEdge(1, 2, 10);
      graph.addEdge(1, 2, 3);

      expect(graph.getNeighbors(1)).toEqual([2, 2]);
      expect(graph.getEdges(1).map(entry => entry.edge)).toEqual([10, 3]);
    });

    it('should remove only the forward edge', () => {
      graph.addEdge(1, 2, 10);
      graph.addEdge(2, 3, 20);

      graph.removeEdge(1, 2);

      expect(graph.getNeighbors(1)).toEqual([]);
      expect(graph.getNeighbors(2)).toEqual([3]);
    });

    it('should remove every parallel edge between the pair', () => {
      graph.addEdge(1, 2, 10);
      graph.addEdge(1, 3, 1);
      graph.addEdge(1, 2, 11);

      graph.removeEdge(1, 2);

      expect(graph.getNeighbors(1)).toEqual([3]);
    });

    it('should strip edges pointing at a removed node', () => {
      graph.addEdge(1, 2, 1);
      graph.addEdge(3, 2, 1);
      graph.addEdge(3, 1, 1);

      graph.removeNode(2);

      expect(graph.hasNode(2)).toBe(false);
      expect(graph.getNeighbors(1)).toEqual([]);
      expect(graph.getNeighbors(3)).toEqual([1]);
    });
  });

  describe('undirected edges', () => {
    let graph: Graph<string, number>;

    beforeEach(() => {
      graph = new Graph<string, number>(false);
    });

    it('should add the mirrored edge with the same payload', () => {
      graph.addEdge('A', 'B', 1.5);

      expect(graph.getNeighbors('A')).toEqual(['B']);
      expect(graph.getNeighbors('B')).toEqual(['A']);
      expect(graph.getEdges('B')).toEqual([{ node: 'A', edge: 1.5 }]);
    });

    it('should remove both directions', () => {
      graph.addEdge('A', 'B', 1);
      graph.addEdge('A', 'C', 1);

      graph.removeEdge('B', 'A');

      expect(graph.getNeighbors('A')).toEqual(['C']);
      expect(graph.getNeighbors('B')).toEqual([]);
      expect(graph.getNeighbors('C')).toEqual(['A']);
    });
  });

  describe('queries on absent nodes', () => {
    it('should return empty results instead of throwing', () => {
      const graph = new Graph<string, number>();

      expect(graph.getNeighbors('missing')).toEqual([]);
      expect(graph.getEdges('missing')).toEqual([]);
      expect(graph.hasNode('missing')).toBe(false);
      expect(() => graph.removeEdge('missing', 'other')).not.toThrow();
    });
  });

  describe('forEachEdge', () => {
    it('should visit every entry grouped by source in adjacency order', () => {
      const graph = new Graph<string, number>(true);
      graph.addEdge('A', 'B', 1);
      graph.addEdge('B', 'C', 2);
      graph.addEdge('A', 'C', 3);

      const visited: string[] = [];
      graph.forEachEdge((from, to, edge) => visited.push(`${from}${to}${edge}`));

      expect(visited).toEqual(['AB1', 'AC3', 'BC2']);
    });
  });

  describe('compareNodeKeys', () => {
    it('should order keys ascending', () => {
      expect(compareNodeKeys('A', 'B')).toBe(-1);
      expect(compareNodeKeys(3, 2)).toBe(1);
      expect(compareNodeKeys('X', 'X')).toBe(0);
    });
  });
});
