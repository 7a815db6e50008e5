/**
 * Core type definitions for the bootstrap.
 * Provides the Result type for error handling.
 */

export * from './core';
