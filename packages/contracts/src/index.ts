/**
 * @invoice-bridge/contracts
 *
 * TypeScript interfaces and types for the CII to UBL conversion engine.
 * This package has zero runtime dependencies.
 *
 * @packageDocumentation
 */

// Core types
export * from './core/diagnostic.js';
export * from './core/values.js';

// Source and target document models
export * from './cii/cii-document.js';
export * from './ubl/ubl-document.js';

// Conversion
export * from './conversion/config.js';
export * from './conversion/result.js';

// External validation
export * from './validation/validation-service.js';
