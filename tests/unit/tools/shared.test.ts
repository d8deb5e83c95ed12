/**
 * Unit tests for shared tool helpers
 *
 * @module tests/unit/tools/shared
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { validationError } from '../../../src/server/errors.js';
import { formatResponse, handleError } from '../../../src/tools/shared.js';

describe('formatResponse', () => {
  it('serializes the whole result, however large', () => {
    const verifications = Array.from({ length: 2000 }, (_, i) => ({ id: `v-${i}`, note: 'x'.repeat(400) }));
    const response = formatResponse({ success: true, data: { verifications } });

    expect(response.isError).toBeUndefined();
    expect(response.content).toHaveLength(1);
    expect(response.content[0].text).toBe(JSON.stringify({ success: true, data: { verifications } }, null, 2));
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('marks the response as an error', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const response = handleError(validationError('limit must be positive'));

    expect(response.isError).toBe(true);
    expect(JSON.parse(response.content[0].text)).toMatchObject({
      success: false,
      error: { category: 'VALIDATION_ERROR', message: 'limit must be positive' },
    });
  });
});
