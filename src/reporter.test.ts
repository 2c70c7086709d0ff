import { describe, expect, it } from 'vitest';
import { formatFileRow, formatScanRow } from './reporter.js';
import { fileRecord } from './test-fixtures.js';

describe('formatScanRow', () => {
  it('lists the counters of a finished scan', () => {
    const row = formatScanRow({
      scanName: 'laptop',
      startTime: '2024-05-01T08:00:00.000Z',
      endTime: '2024-05-01T08:01:00.000Z',
      numFiles: 3,
      numTaggable: 2,
      numErrors: 0,
    });

    expect(row).toBe(
      'laptop\tstarted 2024-05-01T08:00:00.000Z\tfinished 2024-05-01T08:01:00.000Z\t3 files\t2 taggable\t0 errors'
    );
  });
});

describe('formatFileRow', () => {
  it('shows placeholders for missing tags', () => {
    const row = formatFileRow(
      fileRecord('laptop', '/m/a.mp3', { songTitle: 'Song A', year: 2015, duration: 200.5, taggable: true })
    );

    expect(row).toBe('laptop\ta.mp3\t/m/a.mp3\tSong A\t-\t-\t-\t2015\t3:20\ttaggable\t-');
  });
});
