import type { EmployeeProfile, PerformanceRating } from '../types/interview';

export const NOT_AVAILABLE = 'N/A';

export function joinOrNotAvailable(values: readonly string[] | null | undefined): string {
    if (!values || values.length === 0) {
        return NOT_AVAILABLE;
    }
    return values.join(', ');
}

export function formatPerformanceRating(rating: PerformanceRating | null | undefined): string {
    if (!rating) {
        return NOT_AVAILABLE;
    }
    const base = `${rating.rating}/5 on ${rating.date || NOT_AVAILABLE}`;
    return rating.notes ? `${base} - ${rating.notes}` : base;
}

/**
 * Render an employee profile as the context block every agent prompt starts with.
 * Pure: the same profile always yields the same text.
 */
export function formatEmployeeProfile(profile: EmployeeProfile): string {
    return [
        'EMPLOYEE PROFILE:',
        `Name: ${profile.name}`,
        `Position: ${profile.position}`,
        `Department: ${profile.department}`,
        `Level: ${profile.level}`,
        `Experience: ${profile.experience_years} years`,
        `Skills: ${joinOrNotAvailable(profile.skills)}`,
        `Recent Performance: ${formatPerformanceRating(profile.recent_performance)}`,
        `Career Goals: ${joinOrNotAvailable(profile.career_goals)}`
    ].join('\n');
}
