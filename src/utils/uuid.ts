/**
 * UUID Generation Utilities
 * @module utils/uuid
 */

import { v4 as uuidv4, validate as uuidValidate } from 'uuid';
import type { UUID } from '../types/index.js';

/**
 * Generate a new UUID v4
 */
export function generateUUID(): UUID {
  return uuidv4();
}

/**
 * Validate a UUID string
 */
export function isValidUUID(str: string): boolean {
  return uuidValidate(str);
}
