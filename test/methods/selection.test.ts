import {
  fittestIndex,
  linearScaling,
  scaleFitness,
  selectMate,
  selectSurvivors,
  selection,
} from '../../src/methods/selection';
import { createRandomSource } from '../../src/utils/random';
import { scriptedRandom, withFitness } from '../utils/test-helpers';

describe('Selection Methods', () => {
  describe('descriptors', () => {
    it('defaults linear scaling to 1.6', () => {
      expect(selection.LINEAR_SCALING.scale).toBe(1.6);
    });
  });

  describe('selectMate', () => {
    const population = [1, 2, 3, 4].map((f) => withFitness(f));

    it.each([
      [0, 0],
      [0.25, 1],
      [0.5, 2],
      [0.95, 3],
    ])('maps the draw %p onto index %p', (draw, expected) => {
      // Act
      const index = selectMate(population, new Set(), scriptedRandom([draw]));
      // Assert
      expect(index).toBe(expected);
    });

    it('skips excluded individuals', () => {
      // Arrange
      // eligible sum 8, threshold 2: cumulative 1 (index 0), 4 (index 2)
      const random = scriptedRandom([0.25]);
      // Act
      const index = selectMate(population, new Set([1]), random);
      // Assert
      expect(index).toBe(2);
    });

    it('selects on scaled rather than raw fitness', () => {
      // Arrange
      const scaled = [withFitness(10, 0), withFitness(1, 5)];
      // Act
      const index = selectMate(scaled, new Set(), scriptedRandom([0.1]));
      // Assert
      expect(index).toBe(1);
    });

    it('falls back to the highest-index eligible individual', () => {
      // Arrange
      // a draw outside [0, 1) leaves the threshold above every cumulative sum
      const random = scriptedRandom([1.5]);
      // Act
      const index = selectMate(population, new Set([3]), random);
      // Assert
      expect(index).toBe(2);
    });
  });

  describe('linearScaling', () => {
    it('stretches the maximum to scale * mean when the minimum allows it', () => {
      // Act
      const coefficients = linearScaling({ min: 0, mean: 1, max: 2 }, 1.6);
      // Assert
      expect(coefficients?.a).toBeCloseTo(0.6);
      expect(coefficients?.b).toBeCloseTo(0.4);
    });

    it('stretches as far as the minimum allows otherwise', () => {
      // Act
      const coefficients = linearScaling({ min: 0.5, mean: 1, max: 1.2 }, 2);
      // Assert
      expect(coefficients?.a).toBeCloseTo(2);
      expect(coefficients?.b).toBeCloseTo(-1);
    });

    it('preserves the mean', () => {
      // Arrange
      const summary = { min: 0.2, mean: 0.5, max: 0.9 };
      // Act
      const coefficients = linearScaling(summary, 1.8);
      // Assert
      expect(coefficients).toBeDefined();
      if (coefficients) expect(coefficients.a * 0.5 + coefficients.b).toBeCloseTo(0.5);
    });

    it('returns undefined when every fitness is equal', () => {
      expect(linearScaling({ min: 0.3, mean: 0.3, max: 0.3 }, 1.6)).toBeUndefined();
    });
  });

  describe('scaleFitness', () => {
    it('applies the linear map to every individual', () => {
      // Arrange
      const population = [0, 1, 2].map((f) => withFitness(f));
      // Act
      const scaled = scaleFitness(population, { min: 0, mean: 1, max: 2 }, 1.6);
      // Assert
      expect(scaled).toBe(true);
      const values = population.map((g) => g.scaledFitness ?? -1);
      expect(values[0]).toBeCloseTo(0.4);
      expect(values[1]).toBeCloseTo(1);
      expect(values[2]).toBeCloseTo(1.6);
    });

    it('clips negative scaled values to 0', () => {
      // Arrange
      const population = [withFitness(0)];
      // Act
      scaleFitness(population, { min: 0.5, mean: 1, max: 1.2 }, 2);
      // Assert
      expect(population[0].scaledFitness).toBe(0);
    });

    it('leaves scaled fitness untouched without spread', () => {
      // Arrange
      const population = [withFitness(0.3), withFitness(0.3)];
      // Act
      const scaled = scaleFitness(population, { min: 0.3, mean: 0.3, max: 0.3 }, 1.6);
      // Assert
      expect(scaled).toBe(false);
      expect(population.map((g) => g.scaledFitness)).toEqual([0.3, 0.3]);
    });
  });

  describe('selectSurvivors', () => {
    it('returns the population itself when it already has the target size', () => {
      // Arrange
      const population = [withFitness(1), withFitness(2)];
      // Act
      const survivors = selectSurvivors(population, 2, scriptedRandom([]));
      // Assert
      expect(survivors).toBe(population);
    });

    it('keeps the fittest individuals', () => {
      // Arrange
      const population = [1, 5, 3, 4, 2].map((f) => withFitness(f));
      // Act
      const survivors = selectSurvivors(population, 3, createRandomSource('survivors'));
      // Assert
      expect(survivors.map((g) => g.fitness).sort()).toEqual([3, 4, 5]);
    });

    it('shuffles the survivors', () => {
      // Arrange
      const population = [1, 5, 3, 4, 2].map((f) => withFitness(f));
      // ranked [5, 4, 3]; i = 2 swaps with 0, i = 1 swaps with 1
      const random = scriptedRandom([0, 0.9]);
      // Act
      const survivors = selectSurvivors(population, 3, random);
      // Assert
      expect(survivors.map((g) => g.fitness)).toEqual([3, 4, 5]);
    });
  });

  describe('fittestIndex', () => {
    it('returns the first index of the maximum', () => {
      // Arrange
      const population = [1, 3, 3, 2].map((f) => withFitness(f));
      // Assert
      expect(fittestIndex(population)).toBe(1);
    });
  });
});
