/**
 * Test Utilities Index
 *
 * USAGE:
 * ```typescript
 * import { createStraightRoad, createDocument } from '../../utils/index.js';
 * ```
 */

export * from './fixtures.js';
