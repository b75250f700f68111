import type { DeepPartial, FindOptionsOrder, FindOptionsWhere, ObjectLiteral } from 'typeorm';
import type { ILogger } from '../config/logger';
import type { IRepository } from '../db/interfaces';
import { AppError, DatabaseError, ValidationError, errorMessage } from '../utils/errors';

const UNIQUE_VIOLATION = '23505';

function driverCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

export interface RepositoryOptions<T extends ObjectLiteral> {
    table: string;
    /** Where clause selecting one row by primary key, including any default scope. */
    byId: (id: string) => FindOptionsWhere<T>;
    /** Applied to every list query (e.g. hide soft-deleted rows). */
    scope?: FindOptionsWhere<T>;
    order?: FindOptionsOrder<T>;
}

/**
 * Base Repository
 *
 * CRUD over a TypeORM repository. Every call goes through `run`, which turns
 * driver failures into DatabaseError (unique violations into ValidationError)
 * with the operation and table attached.
 */
export abstract class BaseRepository<T extends ObjectLiteral> {
    protected readonly table: string;

    constructor(
        protected readonly repository: IRepository<T>,
        protected readonly options: RepositoryOptions<T>,
        protected readonly logger: ILogger
    ) {
        this.table = options.table;
    }

    async create(data: DeepPartial<T>): Promise<T> {
        return this.run('create', () => this.repository.save(this.repository.create(data)));
    }

    async findById(id: string): Promise<T | null> {
        return this.run('findById', () => this.repository.findOne({ where: this.options.byId(id) }));
    }

    async findAll(limit: number = 100, offset: number = 0): Promise<T[]> {
        return this.findWhere(this.options.scope, { take: limit, skip: offset });
    }

    /**
     * Apply `changes` to the row with this id. Returns null when it does not exist.
     */
    async update(id: string, changes: DeepPartial<T>): Promise<T | null> {
        const existing = await this.findById(id);
        if (!existing) {
            return null;
        }
        return this.run('update', () => this.repository.save({ ...existing, ...changes }));
    }

    async delete(id: string): Promise<boolean> {
        const result = await this.run('delete', () => this.repository.delete(this.options.byId(id)));
        return (result.affected ?? 0) > 0;
    }

    async exists(id: string): Promise<boolean> {
        const count = await this.run('exists', () => this.repository.count({ where: this.options.byId(id) }));
        return count > 0;
    }

    protected findWhere(
        where: FindOptionsWhere<T> | FindOptionsWhere<T>[] | undefined,
        page: { take?: number; skip?: number; order?: FindOptionsOrder<T> } = {}
    ): Promise<T[]> {
        return this.run('find', () =>
            this.repository.find({
                where,
                order: page.order ?? this.options.order,
                take: page.take,
                skip: page.skip
            })
        );
    }

    protected async run<R>(operation: string, query: () => Promise<R>): Promise<R> {
        try {
            return await query();
        } catch (error) {
            if (error instanceof AppError) {
                throw error;
            }

            if (driverCode(error) === UNIQUE_VIOLATION) {
                throw new ValidationError(`Duplicate value in ${this.table}`, {
                    cause: error,
                    details: { operation, table: this.table }
                });
            }

            this.logger.error({ table: this.table, operation, error: errorMessage(error) }, 'Database operation failed');
            throw new DatabaseError(`Failed to ${operation} in ${this.table}: ${errorMessage(error)}`, {
                operation,
                table: this.table,
                cause: error
            });
        }
    }
}
