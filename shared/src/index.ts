/**
 * Renderer core and shared infrastructure for the raybox monorepo
 */

// =============================================================================
// UTILITIES - Logging, error types
// =============================================================================
export * from './utils/index.js';

// =============================================================================
// CONFIGURATION
// =============================================================================
export * from './config/index.js';

// =============================================================================
// DOMAIN MODULES
// =============================================================================

// Geometry - vectors, rays and bases in a right-handed, Y-up coordinate system
export * from './geometry/index.js';

// Ray tracing - materials, intersection, shading, frame driver, scene documents
export * from './raytracing/index.js';
