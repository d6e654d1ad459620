import { describe, it, expect } from 'vitest';
import { contentHashId, correlationId, feedId, threatEventId } from '../id-utils';

describe('content-addressed ids', () => {
  it('derives a 32 character hex id from the key fields', () => {
    expect(threatEventId('198.51.100.7', '2026-03-01T10:00:00.000Z')).toBe(
      '7729871cf205c6a1525065734598840f'
    );
  });

  it('is stable for identical inputs', () => {
    expect(threatEventId('203.0.113.9', '2026-03-01T10:00:00.000Z')).toBe(
      threatEventId('203.0.113.9', '2026-03-01T10:00:00.000Z')
    );
    expect(correlationId('a', 'b')).toBe(correlationId('a', 'b'));
  });

  it('changes when any key field changes', () => {
    const base = threatEventId('203.0.113.9', '2026-03-01T10:00:00.000Z');
    expect(threatEventId('203.0.113.10', '2026-03-01T10:00:00.000Z')).not.toBe(base);
    expect(threatEventId('203.0.113.9', '2026-03-01T10:00:01.000Z')).not.toBe(base);
  });

  it('does not collide when fields are shifted across the boundary', () => {
    expect(contentHashId('ab', 'c')).not.toBe(contentHashId('a', 'bc'));
  });

  it('keeps pair order significant', () => {
    expect(correlationId('cyber-1', 'physical-1')).not.toBe(correlationId('physical-1', 'cyber-1'));
  });

  it('keys feeds by source name', () => {
    expect(feedId('test-feed')).toMatch(/^[0-9a-f]{32}$/);
    expect(feedId('test-feed')).toBe(contentHashId('test-feed'));
  });
});
