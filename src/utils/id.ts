/**
 * ID Generation Utilities
 * 
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every scheme and every emitted notification carries a fresh UUID v4.
 * 
 * RULES:
 * 1. NEVER reuse IDs across schemes
 * 2. NEVER derive IDs from scheme parameters
 * 3. Each call MUST return a brand new UUID
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { v4 as uuidv4, validate as uuidValidate, version as uuidVersion } from 'uuid';

/**
 * Generate the identifier of a newly constructed scheme.
 *
 * @example
 * ```typescript
 * const id = generateSchemeId();
 * // Returns: "550e8400-e29b-41d4-a716-446655440000"
 * ```
 */
export function generateSchemeId(): string {
    return uuidv4();
}

/**
 * Generate the identifier of a single notification (transition, transfer,
 * approval or redemption).
 */
export function generateEventId(): string {
    return uuidv4();
}

export function isValidId(id: string): boolean {
    return uuidValidate(id) && uuidVersion(id) === 4;
}
