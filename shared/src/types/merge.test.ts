import { describe, it, expect } from '@jest/globals';
import type { MergeMetadata, MergeRequest } from './merge.js';

describe('Merge types', () => {
  it('accepts a request with only prompt ids', () => {
    const request: MergeRequest = { promptIds: [3, 1, 2] };

    expect(request.strategy).toBeUndefined();
    expect(request.promptIds).toEqual([3, 1, 2]);
  });

  it('echoes options in metadata', () => {
    const metadata: MergeMetadata = {
      strategy: 'template',
      promptCount: 2,
      promptIds: [1, 2],
      promptTitles: ['A', 'B'],
      mergedAt: '2026-01-01T00:00:00.000Z',
      options: { template: '{count}:{title_1}' },
    };

    expect(metadata.options.template).toBe('{count}:{title_1}');
  });
});
