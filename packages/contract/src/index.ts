// Procedure types and events
export * from './procedures.schema.js';

// Applications, submissions and the queue view
export * from './applications.schema.js';
