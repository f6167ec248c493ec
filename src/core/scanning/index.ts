// src/core/scanning/index.ts

// Export the service implementation
export * from './scanner.service';

// Export interfaces and tokens
export * from './interfaces/services';
