/**
 * Frontier entries and path reconstruction for A* search
 */

import type { Board, FrontierEntry, Move, ParentLink } from '../domain/types.js';
import { compareBoards } from '../state/state-hash.js';

/**
 * Create a frontier entry
 */
export function createFrontierEntry(g: number, h: number, board: Board): FrontierEntry {
  return { f: g + h, h, g, board };
}

/**
 * Ascending by f, then h, then g
 *
 * Boards break the remaining ties, which makes the pop order total and the
 * expansion counts reproducible.
 */
export function compareFrontierEntries(a: FrontierEntry, b: FrontierEntry): number {
  if (a.f !== b.f) return a.f - b.f;
  if (a.h !== b.h) return a.h - b.h;
  if (a.g !== b.g) return a.g - b.g;
  return compareBoards(a.board, b.board);
}

/**
 * Walk parent links back to the start and return moves and boards
 * in start-to-goal order
 */
export function reconstructPath(
  goalKey: string,
  parents: ReadonlyMap<string, ParentLink>
): { path: Move[]; boards: Board[] } {
  const path: Move[] = [];
  const boards: Board[] = [];
  let key: string | null = goalKey;

  while (key !== null) {
    const link = parents.get(key);
    if (!link) {
      throw new Error(`Missing parent link for board ${key}`);
    }

    boards.push(link.board);
    if (link.move !== null) {
      path.push(link.move);
    }
    key = link.parent;
  }

  path.reverse();
  boards.reverse();

  return { path, boards };
}

/**
 * Priority queue for A* search
 */
export class PriorityQueue<T> {
  private items: T[] = [];

  constructor(private readonly compare: (a: T, b: T) => number) {}

  push(item: T): void {
    // Binary heap insert
    this.items.push(item);
    this.bubbleUp(this.items.length - 1);
  }

  pop(): T | undefined {
    if (this.items.length === 0) return undefined;

    const result = this.items[0];
    const last = this.items.pop();

    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.bubbleDown(0);
    }

    return result;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  size(): number {
    return this.items.length;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (this.compare(this.items[parentIndex], this.items[index]) <= 0) {
        break;
      }
      [this.items[parentIndex], this.items[index]] = [this.items[index], this.items[parentIndex]];
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    while (true) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;
      let smallest = index;

      if (leftChild < this.items.length &&
          this.compare(this.items[leftChild], this.items[smallest]) < 0) {
        smallest = leftChild;
      }

      if (rightChild < this.items.length &&
          this.compare(this.items[rightChild], this.items[smallest]) < 0) {
        smallest = rightChild;
      }

      if (smallest === index) break;

      [this.items[smallest], this.items[index]] = [this.items[index], this.items[smallest]];
      index = smallest;
    }
  }
}
