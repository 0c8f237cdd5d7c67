import { ValueTransformer } from 'typeorm';

// Timestamps are stored as epoch milliseconds so ordering and range checks stay exact in SQLite
export const epochMillis: ValueTransformer = {
  to: (value: Date | null | undefined) => (value instanceof Date ? value.getTime() : value),
  from: (value: number | null) => (value === null || value === undefined ? value : new Date(Number(value))),
};
