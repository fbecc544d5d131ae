/**
 * Format helpers, barrel export
 */

export { decodeInput, isXml, validateXml } from './xml';
