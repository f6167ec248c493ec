// src/core/ledger/index.ts

// Export the service implementation
export * from './ledger-codec.service';

// Export interfaces and constants
export * from './interfaces/services';
