/**
 * Database Interfaces
 *
 * The slice of TypeORM's Repository the application repositories use.
 * A TypeORM Repository satisfies it as is; tests hand in vi.fn() stubs.
 */
import type {
    DeepPartial,
    DeleteResult,
    FindManyOptions,
    FindOneOptions,
    FindOptionsWhere,
    ObjectLiteral
} from "typeorm";

export interface IRepository<T extends ObjectLiteral> {
    findOne(options: FindOneOptions<T>): Promise<T | null>;
    find(options?: FindManyOptions<T>): Promise<T[]>;
    count(options?: FindManyOptions<T>): Promise<number>;
    create(entityLike: DeepPartial<T>): T;
    save<E extends DeepPartial<T>>(entity: E): Promise<E & T>;
    delete(criteria: FindOptionsWhere<T>): Promise<DeleteResult>;
}
