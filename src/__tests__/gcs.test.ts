import { describe, expect, it } from 'vitest';
import { parseGcsUri } from '@/lib/gcs';

describe('parseGcsUri', () => {
  it('splits bucket and object path', () => {
    expect(parseGcsUri('gs://test-bucket/outputs/123/sample_0.mp4')).toEqual({
      bucket: 'test-bucket',
      path: 'outputs/123/sample_0.mp4',
    });
  });

  it('rejects URIs outside Cloud Storage', () => {
    expect(() => parseGcsUri('https://example.com/video.mp4')).toThrow(
      'Invalid Cloud Storage URI: https://example.com/video.mp4'
    );
    expect(() => parseGcsUri('gs://bucket-only')).toThrow('Invalid Cloud Storage URI: gs://bucket-only');
  });
});
