import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn, UpdateDateColumn } from "typeorm";
import type { PerformanceRating } from "../../types/interview";
import type { SoftDeletable } from "../soft-delete";

const numericToNumber = {
    to: (value: number | null): number | null => value,
    from: (value: string | null): number | null => (value === null ? null : Number(value))
};

/**
 * Employee Entity
 *
 * The person being interviewed. Agents never read this row directly: the
 * employee directory projects it into an EmployeeProfile snapshot first.
 *
 * performance_ratings is an append-only history; the directory picks the
 * latest by date as `recent_performance`.
 *
 * Rows are soft deleted (see soft-delete.ts) so interviews and evaluations
 * keep pointing at a real employee.
 */
@Entity({ name: "employees" })
export class Employee implements SoftDeletable {
    @PrimaryGeneratedColumn("uuid")
    id!: string;

    @Column({ type: "varchar", length: 255 })
    name!: string;

    @Column({ type: "varchar", length: 255, unique: true })
    email!: string;

    @Column({ type: "varchar", length: 255 })
    position!: string;

    @Index()
    @Column({ type: "varchar", length: 50 })
    department!: string; // engineering, marketing, sales, hr, finance, operations

    @Column({ type: "varchar", length: 20 })
    level!: string; // intern → director

    @Column({ type: "int", default: 0 })
    experience_years!: number;

    @Column({ type: "text", array: true, default: () => "'{}'" })
    skills!: string[];

    @Column({ type: "jsonb", default: () => "'[]'" })
    performance_ratings!: PerformanceRating[];

    @Column({ type: "text", array: true, default: () => "'{}'" })
    career_goals!: string[];

    @Index()
    @Column({ type: "uuid", nullable: true })
    manager_id!: string | null;

    @Column({ type: "date", nullable: true })
    hire_date!: string | null;

    @Column({ type: "numeric", precision: 12, scale: 2, nullable: true, transformer: numericToNumber })
    salary!: number | null;

    @CreateDateColumn({ name: "created_at", type: "timestamp" })
    created_at!: Date;

    @UpdateDateColumn({ name: "updated_at", type: "timestamp" })
    updated_at!: Date;

    @Column({ type: "timestamp", nullable: true })
    deleted_at!: Date | null;
}
