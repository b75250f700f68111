import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn, UpdateDateColumn } from "typeorm";
import type { DifficultyLevel, QuestionCategory, QuestionType } from "../../types/interview";

/**
 * Question bank entry. Generated questions can be saved here and reused;
 * empty target arrays mean "any".
 */
@Entity({ name: "questions" })
export class Question {
    @PrimaryGeneratedColumn("uuid")
    id!: string;

    @Column({ type: "text" })
    question_text!: string;

    @Column({ type: "varchar", length: 50 })
    question_type!: QuestionType;

    @Column({ type: "varchar", length: 50 })
    category!: QuestionCategory;

    @Column({ type: "varchar", length: 20, default: "medium" })
    difficulty!: DifficultyLevel;

    @Column({ type: "text", array: true, default: () => "'{}'" })
    target_positions!: string[];

    @Column({ type: "text", array: true, default: () => "'{}'" })
    target_departments!: string[];

    @Column({ type: "text", array: true, default: () => "'{}'" })
    target_levels!: string[];

    @Column({ type: "boolean", default: true })
    is_active!: boolean;

    @CreateDateColumn({ name: "created_at", type: "timestamp" })
    created_at!: Date;

    @UpdateDateColumn({ name: "updated_at", type: "timestamp" })
    updated_at!: Date;
}
