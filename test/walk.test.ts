import Maze from '../src/maze';
import { Pos, posKey } from '../src/physical';
import { LFSR } from '../src/random/lfsr';
import { QuadWalls } from '../src/shape/quad';
import { OpenSet, Path } from '../src/walk';
import { WallPos, formatWallPos } from '../src/wall';
import { openBetween } from './utils/test-helpers';

const p = (col: number, row: number): Pos => ({ col, row });

describe('OpenSet', () => {
  describe('Scenario: mixed priorities', () => {
    const set = new OpenSet();
    set.push(3, p(0, 0));
    set.push(1, p(1, 0));
    set.push(2, p(2, 0));
    set.push(1, p(3, 0));
    const order = [set.pop(), set.pop(), set.pop(), set.pop(), set.pop()];

    it('pops the lowest priority first, first in on ties', () => {
      // Assert
      expect(order).toEqual([p(1, 0), p(3, 0), p(2, 0), p(0, 0), undefined]);
    });

    it('ends empty', () => {
      // Assert
      expect(set.size).toBe(0);
    });
  });

  describe('contains', () => {
    it('reports a queued position', () => {
      // Arrange
      const set = new OpenSet();
      set.push(5, p(1, 1));

      // Act
      const result = set.contains(p(1, 1));

      // Assert
      expect(result).toBe(true);
    });

    it('forgets a position once popped', () => {
      // Arrange
      const set = new OpenSet();
      set.push(5, p(1, 1));
      set.pop();

      // Act
      const result = set.contains(p(1, 1));

      // Assert
      expect(result).toBe(false);
    });

    it('keeps a position queued twice until both entries are popped', () => {
      // Arrange
      const set = new OpenSet();
      set.push(1, p(1, 1));
      set.push(2, p(1, 1));
      set.pop();

      // Act
      const result = set.contains(p(1, 1));

      // Assert
      expect(result).toBe(true);
    });
  });
});

describe('Path', () => {
  const successors = new Map([
    [posKey(p(0, 0)), p(1, 0)],
    [posKey(p(1, 0)), p(1, 1)],
  ]);

  it('iterates from the first to the last room', () => {
    // Act
    const rooms = new Path(p(0, 0), p(1, 1), successors).toArray();

    // Assert
    expect(rooms).toEqual([p(0, 0), p(1, 0), p(1, 1)]);
  });

  it('counts the rooms', () => {
    // Act
    const length = new Path(p(0, 0), p(1, 1), successors).length;

    // Assert
    expect(length).toBe(3);
  });

  it('can be iterated more than once', () => {
    // Arrange
    const path = new Path(p(0, 0), p(1, 1), successors);
    [...path];

    // Act
    const again = [...path];

    // Assert
    expect(again).toHaveLength(3);
  });

  it('throws when the chain breaks before the end', () => {
    // Arrange
    const path = new Path(p(0, 0), p(5, 5), successors);

    // Act & Assert
    expect(() => path.toArray()).toThrow('incomplete path at (1, 1)');
  });
});

describe('walk', () => {
  it('returns a single room path from a room to itself', () => {
    // Arrange
    const maze = Maze.create('hex', 3, 3);

    // Act
    const path = maze.walk(p(1, 1), p(1, 1));

    // Assert
    expect(path?.toArray()).toEqual([p(1, 1)]);
  });

  it('returns undefined for disconnected rooms', () => {
    // Arrange
    const maze = Maze.create('quad', 3, 1);
    openBetween(maze, p(0, 0), p(1, 0));

    // Act
    const path = maze.walk(p(0, 0), p(2, 0));

    // Assert
    expect(path).toBeUndefined();
  });

  it('returns undefined for a room outside the maze', () => {
    // Arrange
    const maze = Maze.create('quad', 2, 2);
    maze.initialize(new LFSR(3n), 'clear');

    // Act
    const path = maze.walk(p(0, 0), p(2, 0));

    // Assert
    expect(path).toBeUndefined();
  });

  it('does not leave the maze through open border walls', () => {
    // Arrange
    const maze = Maze.create('quad', 2, 1);
    maze.open({ pos: p(0, 0), wall: QuadWalls.UP });
    maze.open({ pos: p(1, 0), wall: QuadWalls.UP });

    // Act
    const path = maze.walk(p(0, 0), p(1, 0));

    // Assert
    expect(path).toBeUndefined();
  });

  it('follows the only route through a winding corridor', () => {
    // Arrange
    const maze = Maze.create('quad', 3, 2);
    openBetween(maze, p(0, 0), p(0, 1));
    openBetween(maze, p(0, 1), p(1, 1));
    openBetween(maze, p(1, 1), p(1, 0));
    openBetween(maze, p(1, 0), p(2, 0));
    openBetween(maze, p(2, 0), p(2, 1));

    // Act
    const path = maze.walk(p(0, 0), p(2, 1));

    // Assert
    expect(path?.toArray()).toEqual([p(0, 0), p(0, 1), p(1, 1), p(1, 0), p(2, 0), p(2, 1)]);
  });

  it('takes the shorter way round a loop', () => {
    // Arrange
    const maze = Maze.create('quad', 3, 3);
    maze.initialize(new LFSR(3n), 'clear');

    // Act
    const path = maze.walk(p(0, 0), p(2, 2));

    // Assert
    expect(path?.length).toBe(5);
  });

  describe.each(['tri', 'quad', 'hex'] as const)('Scenario: %s spanning tree', (shape) => {
    const maze = Maze.create(shape, 7, 6).initialize(new LFSR(2024n), 'branching');
    const path = maze.walk(p(0, 0), p(6, 5));
    const rooms = path?.toArray() ?? [];

    it('finds a path between opposite corners', () => {
      // Assert
      expect(path).toBeDefined();
    });

    it('starts at the first room', () => {
      // Assert
      expect(rooms[0]).toEqual(p(0, 0));
    });

    it('ends at the last room', () => {
      // Assert
      expect(rooms[rooms.length - 1]).toEqual(p(6, 5));
    });

    it('steps only through open walls', () => {
      // Act
      const steps = rooms.slice(1).map((room, i) => maze.connected(rooms[i], room));

      // Assert
      expect(steps.every(Boolean)).toBe(true);
    });
  });
});

describe('followWall', () => {
  describe('Scenario: single closed room', () => {
    const maze = Maze.create('quad', 1, 1);
    const items = [...maze.followWall({ pos: p(0, 0), wall: QuadWalls.UP })];

    it('walks the walls clockwise', () => {
      // Assert
      expect(items.map(([current]) => formatWallPos(current))).toEqual([
        '(0, 0) quad:UP',
        '(0, 0) quad:RIGHT',
        '(0, 0) quad:DOWN',
        '(0, 0) quad:LEFT',
      ]);
    });

    it('pairs each wall with the next one', () => {
      // Assert
      expect(items.map(([, next]) => next && formatWallPos(next))).toEqual([
        '(0, 0) quad:RIGHT',
        '(0, 0) quad:DOWN',
        '(0, 0) quad:LEFT',
        undefined,
      ]);
    });
  });

  describe('Scenario: two rooms joined by an open wall', () => {
    const maze = Maze.create('quad', 2, 1);
    openBetween(maze, p(0, 0), p(1, 0));
    const walk = maze.followWall({ pos: p(0, 0), wall: QuadWalls.LEFT });

    it('goes round both rooms without crossing the open wall', () => {
      // Act
      const walls = [...walk].map(([current]) => formatWallPos(current));

      // Assert
      expect(walls).toEqual([
        '(0, 0) quad:LEFT',
        '(0, 0) quad:UP',
        '(1, 0) quad:UP',
        '(1, 0) quad:RIGHT',
        '(1, 0) quad:DOWN',
        '(0, 0) quad:DOWN',
      ]);
    });

    it('restarts on every iteration', () => {
      // Arrange
      [...walk];

      // Act
      const again = [...walk];

      // Assert
      expect(again).toHaveLength(6);
    });
  });

  it('yields nothing for an open start wall', () => {
    // Arrange
    const maze = Maze.create('quad', 2, 1);
    openBetween(maze, p(0, 0), p(1, 0));

    // Act
    const items = [...maze.followWall({ pos: p(0, 0), wall: QuadWalls.RIGHT })];

    // Assert
    expect(items).toEqual([]);
  });

  it('closes the loop around a hexagonal room', () => {
    // Arrange
    const maze = Maze.create('hex', 3, 3);

    // Act
    const items = [...maze.followWall(maze.wallPositions(p(1, 1))[0])];

    // Assert
    expect(items).toHaveLength(6);
  });

  describe.each(['tri', 'quad', 'hex'] as const)('Scenario: carved %s maze', (shape) => {
    const maze = Maze.create(shape, 8, 7).initialize(new LFSR(99n), 'branching');
    const limit = 4 * maze.positions().length * maze.walls({ col: 0, row: 0 }).length;

    const returnsToStart = (start: WallPos): boolean => {
      let steps = 0;
      for (const [, next] of maze.followWall(start)) {
        if (!next) return true;
        if (++steps > limit) return false;
      }
      return false;
    };

    it('comes back round to every closed start wall', () => {
      // Act
      const stuck = maze
        .positions()
        .flatMap((pos) => maze.wallPositions(pos))
        .filter((wp) => !maze.isOpen(wp) && !returnsToStart(wp))
        .map(formatWallPos);

      // Assert
      expect(stuck).toEqual([]);
    });
  });
});
