import { PrimaryGeneratedColumn } from 'typeorm';
import type { ValueTransformer } from 'typeorm';

/**
 * bigint columns come back from pg as strings; timestamps are epoch milliseconds
 */
export const epochMillis: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? null : Number(value)),
};

export abstract class AppBaseEntity {
  @PrimaryGeneratedColumn({ type: 'integer' })
  id!: number;
}
