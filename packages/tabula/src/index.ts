/**
 * Tabula - All-in-one package
 *
 * The schema DSL, type resolution and code generation in one install:
 *
 * ```bash
 * npm install tabula
 * ```
 *
 * Or install the parts separately:
 *
 * ```bash
 * npm install @tabula/core
 * npm install -D @tabula/codegen
 * ```
 */

// Re-export everything from core
export * from '@tabula/core';

// Code generation
export * from '@tabula/codegen';
