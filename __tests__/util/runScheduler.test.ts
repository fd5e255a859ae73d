import { describe, it, expect } from 'vitest';
import { nextRunDelayMs } from '../../src/util/runScheduler.js';
import { SCHEDULING } from '../../src/core/constants.js';

describe('runScheduler', () => {
  describe('nextRunDelayMs', () => {
    it('should subtract the pass duration from the interval', () => {
      expect(nextRunDelayMs(300000, 40000)).toBe(260000);
      expect(nextRunDelayMs(600000, 0)).toBe(600000);
    });

    it('should enforce minimum delay when the pass overran', () => {
      expect(nextRunDelayMs(60000, 90000)).toBe(SCHEDULING.MIN_DELAY_MS);
    });

    it('should enforce minimum delay for short intervals', () => {
      expect(nextRunDelayMs(1000, 0)).toBe(SCHEDULING.MIN_DELAY_MS);
    });

    it('should treat a negative elapsed time as zero', () => {
      expect(nextRunDelayMs(120000, -5000)).toBe(120000);
    });
  });
});
