// src/core/processing/index.ts

// Export the service implementation
export * from './receipt-processing.service';

// Export interfaces and tokens
export * from './interfaces/services';
