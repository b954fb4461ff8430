import { QuadWalls } from '../src/shape/quad';
import {
  Wall,
  buildCatalog,
  compareWallPos,
  formatWallPos,
  wallPos,
  wallPosEquals,
  wallPosKey,
} from '../src/wall';

describe('Wall', () => {
  describe('normalizedAngle', () => {
    it('wraps negative angles into [0, 2π)', () => {
      // Act
      const result = Wall.normalizedAngle(-Math.PI / 2);

      // Assert
      expect(result).toBeCloseTo((3 * Math.PI) / 2, 12);
    });

    it('wraps angles past a full turn', () => {
      // Act
      const result = Wall.normalizedAngle(5 * Math.PI);

      // Assert
      expect(result).toBeCloseTo(Math.PI, 12);
    });

    it('leaves angles already in range untouched', () => {
      // Act
      const result = Wall.normalizedAngle(1);

      // Assert
      expect(result).toBe(1);
    });
  });

  describe('inSpan', () => {
    describe('Scenario: span crossing the 2π boundary', () => {
      it('contains the zero direction', () => {
        // Act
        const result = QuadWalls.RIGHT.inSpan(0);

        // Assert
        expect(result).toBe(true);
      });

      it('contains a direction just below a full turn', () => {
        // Act
        const result = QuadWalls.RIGHT.inSpan(2 * Math.PI - 0.1);

        // Assert
        expect(result).toBe(true);
      });

      it('excludes a direction facing down', () => {
        // Act
        const result = QuadWalls.RIGHT.inSpan(Math.PI / 2);

        // Assert
        expect(result).toBe(false);
      });
    });

    it('contains the upward direction for the upper wall', () => {
      // Act
      const result = QuadWalls.UP.inSpan(-Math.PI / 2);

      // Assert
      expect(result).toBe(true);
    });
  });

  describe('identity', () => {
    it('equals itself', () => {
      // Act
      const result = QuadWalls.UP.equals(QuadWalls.UP);

      // Assert
      expect(result).toBe(true);
    });

    it('differs from another wall of the same shape', () => {
      // Act
      const result = QuadWalls.UP.equals(QuadWalls.DOWN);

      // Assert
      expect(result).toBe(false);
    });

    it('uses one bit per catalog index', () => {
      // Act
      const masks = [QuadWalls.UP, QuadWalls.LEFT, QuadWalls.DOWN, QuadWalls.RIGHT].map((w) => w.mask);

      // Assert
      expect(masks).toEqual([1, 2, 4, 8]);
    });

    it('prints its qualified name', () => {
      // Act
      const text = String(QuadWalls.LEFT);

      // Assert
      expect(text).toBe('quad:LEFT');
    });
  });

  describe('room order', () => {
    it('links the previous wall counter-clockwise', () => {
      // Assert
      expect(QuadWalls.LEFT.previous).toBe(QuadWalls.DOWN.index);
    });

    it('links the next wall clockwise', () => {
      // Assert
      expect(QuadWalls.LEFT.next).toBe(QuadWalls.UP.index);
    });

    it('records the position within the room', () => {
      // Assert
      expect(QuadWalls.RIGHT.ordinal).toBe(2);
    });
  });
});

describe('WallPos', () => {
  it('compares equal for the same room and wall', () => {
    // Act
    const result = wallPosEquals(
      wallPos({ col: 1, row: 2 }, QuadWalls.UP),
      wallPos({ col: 1, row: 2 }, QuadWalls.UP)
    );

    // Assert
    expect(result).toBe(true);
  });

  it('orders by position before wall', () => {
    // Act
    const result = compareWallPos(
      wallPos({ col: 0, row: 1 }, QuadWalls.RIGHT),
      wallPos({ col: 1, row: 0 }, QuadWalls.UP)
    );

    // Assert
    expect(result).toBeLessThan(0);
  });

  it('orders by wall index within a room', () => {
    // Act
    const result = compareWallPos(
      wallPos({ col: 1, row: 1 }, QuadWalls.RIGHT),
      wallPos({ col: 1, row: 1 }, QuadWalls.LEFT)
    );

    // Assert
    expect(result).toBeGreaterThan(0);
  });

  it('builds a key from position and wall index', () => {
    // Act
    const key = wallPosKey(wallPos({ col: 3, row: -1 }, QuadWalls.DOWN));

    // Assert
    expect(key).toBe('3,-1:2');
  });

  it('formats position and wall name', () => {
    // Act
    const text = formatWallPos(wallPos({ col: 1, row: 2 }, QuadWalls.UP));

    // Assert
    expect(text).toBe('(1, 2) quad:UP');
  });
});

describe('buildCatalog', () => {
  const definition = (name: string, wall = 0) => ({
    name,
    dir: [0, 1] as const,
    span: [0, 1] as const,
    cornerWallOffsets: [{ dx: 0, dy: 0, wall }],
  });

  describe('Scenario: malformed tables', () => {
    it('rejects a room list naming an unknown wall', () => {
      // Act & Assert
      expect(() => buildCatalog('quad', 1, [definition('A')], [['B']])).toThrow(
        'quad: room list references unknown wall B'
      );
    });

    it('rejects a wall listed in two rooms', () => {
      // Act & Assert
      expect(() => buildCatalog('quad', 1, [definition('A')], [['A'], ['A']])).toThrow(
        'quad: wall A listed in more than one room'
      );
    });

    it('rejects a wall belonging to no room', () => {
      // Act & Assert
      expect(() =>
        buildCatalog('quad', 1, [definition('A'), definition('B')], [['A']])
      ).toThrow('quad: wall B belongs to no room');
    });

    it('rejects a corner offset to a missing wall', () => {
      // Act & Assert
      expect(() => buildCatalog('quad', 1, [definition('A', 4)], [['A']])).toThrow(
        'quad: wall A has a corner offset to unknown wall 4'
      );
    });
  });

  describe('Scenario: lookup by name', () => {
    const catalog = buildCatalog('tri', 1, [definition('A'), definition('B')], [['A', 'B']]);

    it('finds a defined wall', () => {
      // Assert
      expect(catalog.byName('B').index).toBe(1);
    });

    it('throws for an unknown wall', () => {
      // Act & Assert
      expect(() => catalog.byName('C')).toThrow('tri: unknown wall C');
    });
  });
});
