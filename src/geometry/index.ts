/**
 * Geometry module - re-exports all geometry utilities
 */

export * from './span';
