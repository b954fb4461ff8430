import { connectAll, isCandidate, randomRoom, randomWall } from '../../src/initialize/common';
import Matrix from '../../src/matrix';
import Maze from '../../src/maze';
import { LFSR } from '../../src/random/lfsr';
import { formatWallPos } from '../../src/wall';
import { fixedRandomizer, innerOpenWalls, openBetween, reachableCount } from '../utils/test-helpers';

describe('initialize/common', () => {
  describe('randomRoom', () => {
    it('picks among the marked positions only', () => {
      // Arrange
      const mask = new Matrix(3, 1, ({ col }) => col > 0);

      // Act
      const pos = randomRoom(fixedRandomizer(), mask);

      // Assert
      expect(pos).toEqual({ col: 1, row: 0 });
    });

    it('finds nothing in an empty mask', () => {
      // Arrange
      const mask = Matrix.filled(2, 2, false);

      // Act
      const pos = randomRoom(fixedRandomizer(), mask);

      // Assert
      expect(pos).toBeUndefined();
    });
  });

  describe('randomWall', () => {
    const maze = Maze.create('quad', 2, 2);
    const inside = (pos: { col: number; row: number }): boolean => maze.isInside(pos);

    it('skips walls leading to rejected rooms', () => {
      // Act
      const wallPos = randomWall(maze, fixedRandomizer(), { col: 0, row: 0 }, inside);

      // Assert
      expect(wallPos && formatWallPos(wallPos)).toBe('(0, 0) quad:RIGHT');
    });

    it('draws its index from the randomizer', () => {
      // Act
      const wallPos = randomWall(maze, new LFSR(1n), { col: 0, row: 0 }, inside);

      // Assert
      expect(wallPos && formatWallPos(wallPos)).toBe('(0, 0) quad:DOWN');
    });

    it('finds nothing when every wall is rejected', () => {
      // Act
      const wallPos = randomWall(maze, fixedRandomizer(), { col: 0, row: 0 }, () => false);

      // Assert
      expect(wallPos).toBeUndefined();
    });
  });

  describe('isCandidate', () => {
    const mask = Matrix.filled(1, 1, true);

    it('accepts a marked position', () => {
      // Assert
      expect(isCandidate(mask, { col: 0, row: 0 })).toBe(true);
    });

    it('rejects a position outside the mask', () => {
      // Assert
      expect(isCandidate(mask, { col: 1, row: 0 })).toBe(false);
    });
  });

  describe('connectAll', () => {
    it('joins every pair of adjacent regions', () => {
      // Arrange
      const maze = Maze.create('quad', 3, 1);

      // Act
      connectAll(maze, fixedRandomizer(), Matrix.filled(3, 1, true));

      // Assert
      expect(reachableCount(maze, { col: 0, row: 0 })).toBe(3);
    });

    it('does not pass through rejected rooms', () => {
      // Arrange
      const maze = Maze.create('quad', 3, 1);

      // Act
      connectAll(maze, fixedRandomizer(), new Matrix(3, 1, ({ col }) => col !== 1));

      // Assert
      expect(reachableCount(maze, { col: 0, row: 0 })).toBe(1);
    });

    it('opens nothing in an area already connected', () => {
      // Arrange
      const maze = Maze.create('quad', 2, 2);
      openBetween(maze, { col: 0, row: 0 }, { col: 1, row: 0 });
      openBetween(maze, { col: 1, row: 0 }, { col: 1, row: 1 });
      openBetween(maze, { col: 1, row: 1 }, { col: 0, row: 1 });

      // Act
      connectAll(maze, fixedRandomizer(), Matrix.filled(2, 2, true));

      // Assert
      expect(innerOpenWalls(maze)).toBe(3);
    });
  });
});
