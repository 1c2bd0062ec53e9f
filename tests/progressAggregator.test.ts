import { describe, expect, it } from 'vitest';
import { ProgressAggregator } from '../src/core/download/progressAggregator.js';
import type { BatchProgress } from '../src/core/download/types.js';

const MB = 1024 * 1024;

describe('ProgressAggregator', () => {
  it('throttles reports but always delivers the final one', () => {
    let clock = 0;
    const reports: BatchProgress[] = [];
    const aggregator = new ProgressAggregator({
      totalFiles: 2,
      intervalMs: 500,
      now: () => clock,
      onProgress: (progress) => reports.push(progress),
    });

    aggregator.post({ type: 'file-progress', fileId: '0', downloadedBytes: 100, totalBytes: MB });
    clock = 100;
    aggregator.post({ type: 'file-progress', fileId: '1', downloadedBytes: 100, totalBytes: MB });
    clock = 600;
    aggregator.post({ type: 'file-progress', fileId: '0', downloadedBytes: 200, totalBytes: MB });
    clock = 700;
    aggregator.post({ type: 'file-complete', fileId: '0', sizeBytes: MB });
    clock = 750;
    aggregator.post({ type: 'file-complete', fileId: '1', sizeBytes: MB });

    expect(reports.map((report) => report.completedFiles)).toEqual([0, 0, 2]);
    const last = reports[2];
    expect(last.totalFiles).toBe(2);
    expect(last.elapsedSeconds).toBe(0.75);
    expect(last.speedMBps).toBeCloseTo(2 / 0.75, 6);
  });

  it('counts in-flight bytes in the snapshot', () => {
    let clock = 0;
    const aggregator = new ProgressAggregator({ totalFiles: 3, now: () => clock });

    aggregator.post({ type: 'file-progress', fileId: 'a', downloadedBytes: MB, totalBytes: 0 });
    aggregator.post({ type: 'file-complete', fileId: 'b', sizeBytes: MB });
    clock = 2000;

    expect(aggregator.snapshot()).toEqual({
      completedFiles: 1,
      totalFiles: 3,
      speedMBps: 1,
      elapsedSeconds: 2,
    });
  });
});
