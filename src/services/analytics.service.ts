import type { IBenchmarkProvider } from '../agents/types';
import type { ILogger } from '../config/logger';
import type { EvaluationRepository } from '../repositories/evaluation.repository';
import type { InterviewRepository } from '../repositories/interview.repository';
import type { DepartmentBenchmarks } from '../types/interview';

export const DEFAULT_BENCHMARKS: DepartmentBenchmarks = { average_score: 7.0, top_quartile: 8.5 };

// Share of evaluations that must mention a skill before demand counts as rising
const DEMAND_THRESHOLD = 0.3;

export interface SkillTrend {
    skill: string;
    timeframe_days: number;
    evaluations: number;
    mentions: number;
    average_score: number | null;
    demand_trend: 'increasing' | 'stable';
}

function mean(values: readonly number[]): number {
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Percentile with linear interpolation between closest ranks.
 * `sorted` must be ascending and non-empty.
 */
export function percentile(sorted: readonly number[], p: number): number {
    const rank = (p / 100) * (sorted.length - 1);
    const lower = Math.floor(rank);
    const upper = Math.ceil(rank);
    return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

export function summarizeScores(scores: readonly number[]): DepartmentBenchmarks {
    if (scores.length === 0) {
        return { ...DEFAULT_BENCHMARKS };
    }
    const sorted = [...scores].sort((a, b) => a - b);
    return {
        average_score: mean(sorted),
        median_score: percentile(sorted, 50),
        top_quartile: percentile(sorted, 75),
        bottom_quartile: percentile(sorted, 25)
    };
}

/**
 * Analytics Service
 *
 * Department benchmarks for the agents' prompts and skill trends for the
 * analytics API.
 */
export class AnalyticsService implements IBenchmarkProvider {
    constructor(
        private readonly interviews: InterviewRepository,
        private readonly evaluations: EvaluationRepository,
        private readonly logger: ILogger,
        private readonly now: () => Date = () => new Date()
    ) {}

    async getDepartmentBenchmarks(department: string): Promise<DepartmentBenchmarks> {
        const interviews = await this.interviews.findByDepartment(department);
        const scores = interviews
            .map(interview => interview.overall_score)
            .filter((score): score is number => typeof score === 'number');

        this.logger.debug({ department, scored: scores.length }, 'Computed department benchmarks');
        return summarizeScores(scores);
    }

    async getSkillTrends(skill: string, timeframeDays: number = 90): Promise<SkillTrend> {
        const evaluations = await this.evaluations.findRecent(timeframeDays, this.now());
        const needle = skill.trim().toLowerCase();

        let mentions = 0;
        const skillScores: number[] = [];

        for (const evaluation of evaluations) {
            if (!JSON.stringify(evaluation.detailed_analysis).toLowerCase().includes(needle)) {
                continue;
            }
            mentions++;
            const score = Object.entries(evaluation.scores).find(([criterion]) => criterion === needle)?.[1];
            if (typeof score === 'number') {
                skillScores.push(score);
            }
        }

        return {
            skill,
            timeframe_days: timeframeDays,
            evaluations: evaluations.length,
            mentions,
            average_score: skillScores.length > 0 ? mean(skillScores) : null,
            demand_trend: mentions > evaluations.length * DEMAND_THRESHOLD ? 'increasing' : 'stable'
        };
    }
}
