import { IsNull } from 'typeorm';

/**
 * Soft delete
 *
 * Any record with a nullable `deleted_at` column can be soft deleted. Rows
 * are never removed; queries filter on `notDeleted`.
 */
export interface SoftDeletable {
    deleted_at: Date | null;
}

export const notDeleted = { deleted_at: IsNull() };

export function isDeleted(record: SoftDeletable): boolean {
    return record.deleted_at !== null;
}

export function softDelete<T extends SoftDeletable>(record: T, at: Date = new Date()): T {
    return { ...record, deleted_at: at };
}

export function restore<T extends SoftDeletable>(record: T): T {
    return { ...record, deleted_at: null };
}
