/**
 * OCR Convergence - Data Models
 *
 * Barrel export for all model interfaces.
 */

// Page models
export * from './page.js';

// Correction models
export * from './correction.js';

// Reprocessing queue models
export * from './queue.js';

// Cost ledger models
export * from './ledger.js';
