// src/core/common/entities/index.ts
export * from './receipt-record.entity';
