/**
 * Shelf Allocation Engine
 *
 * Main entry point for the library
 */

// Export geometry types
export * from './types/geometry';

// Export span utilities
export * from './geometry';

// Export the allocation engine
export * from './algorithm';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'Shelf Allocation Engine';
