import { config } from '../src/config';
import {
  breakWalls,
  heatmap,
  heatMapPairs,
  heatmapOfType,
  parseBreakSpec,
  parseHeatMapType,
} from '../src/heatmap';
import Maze from '../src/maze';
import { resetWarnings } from '../src/utils/warnings';
import { fixedRandomizer, hMaze } from './utils/test-helpers';

describe('heatmap', () => {
  describe('heatMapPairs', () => {
    it('joins the ends of every column for vertical maps', () => {
      // Act
      const pairs = heatMapPairs('vertical', 2, 3);

      // Assert
      expect(pairs).toEqual([
        [{ col: 0, row: 0 }, { col: 0, row: 2 }],
        [{ col: 1, row: 0 }, { col: 1, row: 2 }],
      ]);
    });

    it('joins the ends of every row for horizontal maps', () => {
      // Act
      const pairs = heatMapPairs('horizontal', 3, 1);

      // Assert
      expect(pairs).toEqual([[{ col: 0, row: 0 }, { col: 2, row: 0 }]]);
    });

    it('starts full maps from every room on the top or left edge', () => {
      // Act
      const pairs = heatMapPairs('full', 2, 2);

      // Assert
      expect(pairs).toEqual([
        [{ col: 0, row: 0 }, { col: 1, row: 1 }],
        [{ col: 1, row: 0 }, { col: 0, row: 1 }],
        [{ col: 0, row: 1 }, { col: 1, row: 0 }],
      ]);
    });
  });

  describe('Scenario: open corridor of three rooms', () => {
    const maze = Maze.create('quad', 3, 1).initialize(fixedRandomizer(), 'clear');

    it('counts every full route through each room', () => {
      // Act
      const heat = heatmapOfType(maze, 'full');

      // Assert
      expect(heat.values()).toEqual([2, 3, 2]);
    });

    it('counts the single horizontal route once per room', () => {
      // Act
      const heat = heatmapOfType(maze, 'horizontal');

      // Assert
      expect(heat.values()).toEqual([1, 1, 1]);
    });

    it('counts single room vertical routes once', () => {
      // Act
      const heat = heatmapOfType(maze, 'vertical');

      // Assert
      expect(heat.values()).toEqual([1, 1, 1]);
    });
  });

  it('concentrates vertical traffic in the middle column of an H', () => {
    // Act
    const heat = heatmapOfType(hMaze(), 'vertical');

    // Assert
    expect(heat.values()).toEqual([1, 3, 1, 0, 3, 0, 1, 3, 1]);
  });

  it('combines partial maps by addition', () => {
    // Arrange
    const maze = hMaze();
    const [first, ...rest] = heatMapPairs('vertical', 3, 3);

    // Act
    const combined = heatmap(maze, [first]).add(heatmap(maze, rest));

    // Assert
    expect(combined.values()).toEqual(heatmapOfType(maze, 'vertical').values());
  });

  describe('Scenario: disconnected pairs', () => {
    let warn: jest.SpyInstance;

    beforeEach(() => {
      resetWarnings();
      config.warnings = true;
      warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
      config.warnings = false;
      warn.mockRestore();
    });

    it('contributes nothing', () => {
      // Act
      const heat = heatmapOfType(Maze.create('quad', 2, 2), 'vertical');

      // Assert
      expect(heat.values()).toEqual([0, 0, 0, 0]);
    });

    it('warns once', () => {
      // Act
      heatmapOfType(Maze.create('quad', 2, 2), 'vertical');
      heatmapOfType(Maze.create('quad', 2, 2), 'horizontal');

      // Assert
      expect(warn.mock.calls).toEqual([['heatmap: some room pairs are not connected and were skipped']]);
    });
  });

  describe('parseHeatMapType', () => {
    it('accepts a type name with blanks', () => {
      // Act & Assert
      expect(parseHeatMapType(' full ')).toBe('full');
    });

    it('rejects an unknown type', () => {
      // Act & Assert
      expect(() => parseHeatMapType('diagonal')).toThrow('unknown heat map type: diagonal');
    });
  });

  describe('parseBreakSpec', () => {
    it('reads a type and a count', () => {
      // Act & Assert
      expect(parseBreakSpec('full, 3')).toEqual({ type: 'full', count: 3 });
    });

    it('defaults the count to one', () => {
      // Act & Assert
      expect(parseBreakSpec('vertical')).toEqual({ type: 'vertical', count: 1 });
    });

    it('rejects a count that is not a number', () => {
      // Act & Assert
      expect(() => parseBreakSpec('full,x')).toThrow('invalid count: x');
    });

    it('rejects more than two parts', () => {
      // Act & Assert
      expect(() => parseBreakSpec('a,b,c')).toThrow('invalid break specification: a,b,c');
    });

    it('rejects an unknown type', () => {
      // Act & Assert
      expect(() => parseBreakSpec('diagonal')).toThrow('unknown heat map type: diagonal');
    });
  });

  describe('breakWalls', () => {
    describe('Scenario: busy middle column', () => {
      const maze = breakWalls(hMaze(), { type: 'vertical', count: 1 }, fixedRandomizer(0.99));

      it('opens the first wall of a busy room', () => {
        // Assert
        expect(maze.connected({ col: 0, row: 1 }, { col: 1, row: 1 })).toBe(true);
      });

      it('leaves quiet rooms alone', () => {
        // Assert
        expect(maze.rooms.at({ col: 2, row: 1 }).openMask).toBe(0);
      });
    });

    it('never breaks a wall when the draw is zero', () => {
      // Arrange
      const maze = hMaze();

      // Act
      breakWalls(maze, { type: 'full', count: 2 }, fixedRandomizer(0));

      // Assert
      expect(maze.toJSON()).toEqual(hMaze().toJSON());
    });

    it('does nothing for zero rounds', () => {
      // Arrange
      const maze = hMaze();

      // Act
      breakWalls(maze, { type: 'vertical', count: 0 }, fixedRandomizer(0.99));

      // Assert
      expect(maze.connected({ col: 0, row: 1 }, { col: 1, row: 1 })).toBe(false);
    });
  });
});
