/**
 * Domain types for the interview pipeline.
 *
 * Payload shapes use snake_case keys: they are stored as jsonb and returned
 * over HTTP unchanged.
 */

export const Department = {
    ENGINEERING: 'engineering',
    MARKETING: 'marketing',
    SALES: 'sales',
    HR: 'hr',
    FINANCE: 'finance',
    OPERATIONS: 'operations'
} as const;
export type Department = typeof Department[keyof typeof Department];

export const EmployeeLevel = {
    INTERN: 'intern',
    JUNIOR: 'junior',
    MID: 'mid',
    SENIOR: 'senior',
    LEAD: 'lead',
    MANAGER: 'manager',
    DIRECTOR: 'director'
} as const;
export type EmployeeLevel = typeof EmployeeLevel[keyof typeof EmployeeLevel];

// Ordered from least to most senior
export const EMPLOYEE_LEVEL_ORDER: readonly EmployeeLevel[] = [
    EmployeeLevel.INTERN,
    EmployeeLevel.JUNIOR,
    EmployeeLevel.MID,
    EmployeeLevel.SENIOR,
    EmployeeLevel.LEAD,
    EmployeeLevel.MANAGER,
    EmployeeLevel.DIRECTOR
];

export const InterviewType = {
    PERFORMANCE_REVIEW: 'performance_review',
    CAREER_DEVELOPMENT: 'career_development',
    SKILLS_ASSESSMENT: 'skills_assessment',
    PROMOTION_REVIEW: 'promotion_review',
    EXIT_INTERVIEW: 'exit_interview'
} as const;
export type InterviewType = typeof InterviewType[keyof typeof InterviewType];

export const InterviewStatus = {
    SCHEDULED: 'scheduled',
    COMPLETED: 'completed',
    CANCELLED: 'cancelled'
} as const;
export type InterviewStatus = typeof InterviewStatus[keyof typeof InterviewStatus];

// A scheduled interview is either completed or cancelled; both are final.
const INTERVIEW_STATUS_TRANSITIONS: Record<InterviewStatus, readonly InterviewStatus[]> = {
    scheduled: ['completed', 'cancelled'],
    completed: [],
    cancelled: []
};

export function canTransition(from: InterviewStatus, to: InterviewStatus): boolean {
    return INTERVIEW_STATUS_TRANSITIONS[from].includes(to);
}

export const QuestionType = {
    BEHAVIORAL: 'behavioral',
    TECHNICAL: 'technical',
    SITUATIONAL: 'situational',
    CAREER_DEVELOPMENT: 'career_development',
    PERFORMANCE: 'performance'
} as const;
export type QuestionType = typeof QuestionType[keyof typeof QuestionType];

export const QuestionCategory = {
    SKILLS_ASSESSMENT: 'skills_assessment',
    LEADERSHIP: 'leadership',
    COMMUNICATION: 'communication',
    PROBLEM_SOLVING: 'problem_solving',
    TEAMWORK: 'teamwork',
    CAREER_GOALS: 'career_goals',
    CULTURAL_FIT: 'cultural_fit'
} as const;
export type QuestionCategory = typeof QuestionCategory[keyof typeof QuestionCategory];

export const DifficultyLevel = {
    EASY: 'easy',
    MEDIUM: 'medium',
    HARD: 'hard'
} as const;
export type DifficultyLevel = typeof DifficultyLevel[keyof typeof DifficultyLevel];

export const EvaluationCriteria = {
    TECHNICAL_SKILLS: 'technical_skills',
    COMMUNICATION: 'communication',
    PROBLEM_SOLVING: 'problem_solving',
    LEADERSHIP: 'leadership',
    TEAMWORK: 'teamwork',
    ADAPTABILITY: 'adaptability',
    CULTURAL_FIT: 'cultural_fit',
    GROWTH_POTENTIAL: 'growth_potential'
} as const;
export type EvaluationCriteria = typeof EvaluationCriteria[keyof typeof EvaluationCriteria];

export const RecommendationType = {
    PROMOTION: 'promotion',
    TRAINING: 'training',
    MENTORING: 'mentoring',
    ROLE_CHANGE: 'role_change',
    PERFORMANCE_IMPROVEMENT: 'performance_improvement',
    RECOGNITION: 'recognition'
} as const;
export type RecommendationType = typeof RecommendationType[keyof typeof RecommendationType];

export interface PerformanceRating {
    date: string;
    rating: number;
    reviewer?: string;
    notes?: string;
}

export interface EmployeeProfile {
    id: string;
    name: string;
    position: string;
    department: string;
    level: string;
    experience_years: number;
    skills: string[];
    recent_performance?: PerformanceRating | null;
    career_goals?: string[] | null;
}

export interface JobRequirements {
    required_skills: string[];
    preferred_skills: string[];
    experience_level: string;
    competencies: string[];
}

export interface DepartmentBenchmarks {
    average_score: number;
    top_quartile: number;
    median_score?: number;
    bottom_quartile?: number;
}

export interface GeneratedQuestion {
    id: string;
    question_text: string;
    question_type: QuestionType;
    category: QuestionCategory;
    rationale: string;
    weight: number;
    expected_elements: string[];
}

/** Keyed by 1-based question index ("1", "2", ...) or by question text. */
export type ResponseMap = Record<string, string>;

export type CriterionScores = Record<EvaluationCriteria, number>;

export interface ResponseQuality {
    completeness: number;
    specificity: number;
    relevance: number;
}

export interface Strength {
    area: string;
    evidence: string;
    impact: string;
}

export interface DevelopmentArea {
    area: string;
    gap: string;
    recommendation: string;
}

export interface AnalysisResult {
    overall_assessment: {
        summary: string;
        key_highlights: string[];
        areas_of_concern: string[];
    };
    criterion_scores: CriterionScores;
    detailed_feedback: {
        strengths: Strength[];
        development_areas: DevelopmentArea[];
    };
    response_quality: ResponseQuality;
}

export interface RecommendationItem {
    type: RecommendationType;
    priority: number; // 1 = highest, 5 = lowest
    title: string;
    description: string;
    action_items: string[];
    timeline: string | null;
    success_metrics: string[];
    estimated_cost: string | null;
    roi_projection: string | null;
}

export interface RecommendationSet {
    executive_summary: {
        overall_recommendation: string;
        key_priorities: string[];
        expected_outcomes: string;
    };
    items: RecommendationItem[];
    long_term_pathway: {
        '6_month_goals': string[];
        '12_month_goals': string[];
        '18_month_goals': string[];
    };
    risk_mitigation: {
        potential_risks: string[];
        mitigation_strategies: string[];
    };
}

export const HIGH_PRIORITY_THRESHOLD = 2;
