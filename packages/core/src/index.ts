// Records
export * from './record/index.js';

// Back stack
export * from './back-stack/index.js';

// Record-scoped state
export * from './record-state/index.js';

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';
