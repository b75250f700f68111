import { Column, CreateDateColumn, Entity, Index, JoinColumn, OneToOne, PrimaryGeneratedColumn } from "typeorm";
import type { AnalysisResult, CriterionScores, RecommendationItem, RecommendationSet } from "../../types/interview";
import { Interview } from "./interview.entity";

export interface DetailedAnalysis {
    analysis: AnalysisResult;
    recommendations: RecommendationSet;
}

/**
 * Evaluation Entity
 *
 * Result of the post-interview evaluation (analysis → recommendations),
 * written by the evaluation worker. One row per interview; a retried job
 * overwrites the previous row.
 *
 * `scores`, `strengths` and `recommendations` are flattened out of
 * `detailed_analysis` so analytics can query them without unpacking the
 * full payload.
 */
@Entity({ name: "evaluations" })
export class Evaluation {
    @PrimaryGeneratedColumn("uuid")
    id!: string;

    @Column({ type: "uuid", unique: true })
    interview_id!: string;

    @OneToOne(() => Interview, { onDelete: "CASCADE" })
    @JoinColumn({ name: "interview_id" })
    interview!: Interview;

    @Index()
    @Column({ type: "uuid" })
    employee_id!: string;

    @Column({ type: "jsonb" })
    scores!: CriterionScores;

    @Column({ type: "double precision" })
    overall_score!: number;

    @Column({ type: "text", array: true, default: () => "'{}'" })
    strengths!: string[];

    @Column({ type: "text", array: true, default: () => "'{}'" })
    areas_for_improvement!: string[];

    @Column({ type: "jsonb", default: () => "'[]'" })
    recommendations!: RecommendationItem[];

    @Column({ type: "double precision" })
    confidence_level!: number;

    @Column({ type: "jsonb" })
    detailed_analysis!: DetailedAnalysis;

    @CreateDateColumn({ name: "created_at", type: "timestamp" })
    created_at!: Date;
}
