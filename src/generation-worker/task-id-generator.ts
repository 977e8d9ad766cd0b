/**
 * Task ID Generator
 * 
 * Generates unique, sortable, URL-safe generation task IDs.
 */

import { customAlphabet } from 'nanoid';

// ============================================================================
// Constants
// ============================================================================

const TASK_ID_PREFIX = 'task_';
const RANDOM_LENGTH = 8;
const ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz';

const nanoid = customAlphabet(ALPHABET, RANDOM_LENGTH);

const TASK_ID_PATTERN = new RegExp(`^${TASK_ID_PREFIX}(\\d+)_([${ALPHABET}]{${RANDOM_LENGTH}})$`);

// ============================================================================
// Task ID Functions
// ============================================================================

/**
 * Generate a unique task ID: task_<epochMs>_<random>
 */
export function generateTaskId(now: number = Date.now()): string {
  return `${TASK_ID_PREFIX}${now}_${nanoid()}`;
}

/**
 * Parse a task ID into its components
 */
export function parseTaskId(taskId: string): { timestamp: number; random: string } | null {
  const match = TASK_ID_PATTERN.exec(taskId);
  if (!match) {
    return null;
  }

  const timestamp = parseInt(match[1], 10);
  if (isNaN(timestamp) || timestamp <= 0) {
    return null;
  }

  return { timestamp, random: match[2] };
}

export function isValidTaskId(taskId: string): boolean {
  return parseTaskId(taskId) !== null;
}
