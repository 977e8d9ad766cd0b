/**
 * Task ID Generator Tests
 */

import { generateTaskId, isValidTaskId, parseTaskId } from '../task-id-generator';

describe('task ids', () => {
  it('should embed the timestamp', () => {
    const id = generateTaskId(1700000000000);

    expect(id).toMatch(/^task_1700000000000_[0-9a-z]{8}$/);
    expect(parseTaskId(id)?.timestamp).toBe(1700000000000);
  });

  it('should be unique', () => {
    const ids = new Set(Array.from({ length: 200 }, () => generateTaskId()));

    expect(ids.size).toBe(200);
  });

  it('should reject malformed ids', () => {
    expect(isValidTaskId('task_123_ABCDEFGH')).toBe(false);
    expect(isValidTaskId('run_1700000000000_abcdefgh')).toBe(false);
    expect(isValidTaskId('task_0_abcdefgh')).toBe(false);
    expect(parseTaskId('task_1700000000000_abc')).toBeNull();
  });
});
