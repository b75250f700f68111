import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn, UpdateDateColumn } from "typeorm";
import type { GeneratedQuestion, InterviewStatus, InterviewType, ResponseMap } from "../../types/interview";
import { Employee } from "./employee.entity";

/**
 * Interview Entity
 *
 * One interview session for one employee.
 *
 * Lifecycle:
 * 1. Created → status "scheduled", no questions yet
 * 2. POST /interviews/:id/questions → generated questions stored in `questions`
 * 3. POST /interviews/:id/responses → answers stored in `responses`, evaluation queued
 * 4. Evaluation worker finishes → `overall_score` set, status "completed"
 *
 * A scheduled interview can also be cancelled. No other transition exists.
 */
@Entity({ name: "interviews" })
export class Interview {
    @PrimaryGeneratedColumn("uuid")
    id!: string;

    @Index()
    @Column({ type: "uuid" })
    employee_id!: string;

    @ManyToOne(() => Employee, { onDelete: "CASCADE" })
    @JoinColumn({ name: "employee_id" })
    employee!: Employee;

    @Column({ type: "varchar", length: 50 })
    interview_type!: InterviewType;

    @Index()
    @Column({ type: "varchar", length: 20, default: "scheduled" })
    status!: InterviewStatus;

    @Column({ type: "timestamp" })
    scheduled_date!: Date;

    @Column({ type: "jsonb", default: () => "'[]'" })
    questions!: GeneratedQuestion[];

    @Column({ type: "jsonb", default: () => "'{}'" })
    responses!: ResponseMap; // keyed by 1-based question index or question text

    @Column({ type: "int", nullable: true })
    duration_minutes!: number | null;

    @Column({ type: "text", nullable: true })
    notes!: string | null;

    @Column({ type: "double precision", nullable: true })
    overall_score!: number | null; // mean criterion score once evaluated

    @CreateDateColumn({ name: "created_at", type: "timestamp" })
    created_at!: Date;

    @UpdateDateColumn({ name: "updated_at", type: "timestamp" })
    updated_at!: Date;
}
