import pdf from 'pdf-parse';
import { z } from 'zod';
import type { ILogger } from '../config/logger';
import { ValidationError, errorMessage } from '../utils/errors';
import { loadJsonCatalog } from './catalog-loader';

export const skillsVocabularySchema = z.object({
    skills: z.array(z.string().min(1))
});

export interface JobDescriptionAnalysis {
    required_skills: string[];
    preferred_skills: string[];
    responsibilities: string[];
    qualifications: string[];
}

type JobDescriptionSection = keyof JobDescriptionAnalysis;

const SECTION_HEADINGS: Array<[RegExp, JobDescriptionSection]> = [
    [/^(required|requirements|must[- ]haves?)\b/i, 'required_skills'],
    [/^(preferred|nice[- ]to[- ]haves?|bonus)\b/i, 'preferred_skills'],
    [/^(responsibilities|duties|what you('|’)ll do)\b/i, 'responsibilities'],
    [/^(qualifications|education)\b/i, 'qualifications']
];

const BULLET = /^(?:[-*•]|\d+[.)])\s+(.+)$/;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Word boundaries that also hold around skills such as "C++" or "Node.js"
function skillPattern(skill: string): RegExp {
    return new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(skill)}(?![A-Za-z0-9])`, 'i');
}

export type PdfParser = (buffer: Buffer) => Promise<{ text: string }>;

/**
 * Document Processor Service
 *
 * Pulls text out of uploaded resumes, finds known skills in it and splits
 * job descriptions into their usual sections.
 */
export class DocumentProcessorService {
    private readonly patterns: Array<{ skill: string; pattern: RegExp }>;

    constructor(
        vocabulary: readonly string[],
        private readonly logger: ILogger,
        private readonly parsePdf: PdfParser = pdf
    ) {
        this.patterns = vocabulary.map(skill => ({ skill, pattern: skillPattern(skill) }));
    }

    /**
     * Factory method for production use
     */
    static async create(vocabularyPath: string, logger: ILogger): Promise<DocumentProcessorService> {
        const { skills } = await loadJsonCatalog(vocabularyPath, skillsVocabularySchema, 'SKILLS_VOCABULARY_PATH');
        return new DocumentProcessorService(skills, logger);
    }

    async extractText(buffer: Buffer): Promise<string> {
        let text: string;
        try {
            ({ text } = await this.parsePdf(buffer));
        } catch (error) {
            throw new ValidationError(`Unreadable PDF: ${errorMessage(error)}`, { fields: ['file'], cause: error });
        }

        if (!text || text.trim().length === 0) {
            throw new ValidationError('PDF contains no extractable text', { fields: ['file'] });
        }

        this.logger.info({ textLength: text.length }, 'Extracted text from PDF');
        return text;
    }

    /**
     * Vocabulary skills found in `text`, in vocabulary order.
     */
    extractSkills(text: string): string[] {
        return this.patterns.filter(({ pattern }) => pattern.test(text)).map(({ skill }) => skill);
    }

    async extractResumeSkills(buffer: Buffer): Promise<string[]> {
        const skills = this.extractSkills(await this.extractText(buffer));
        this.logger.info({ skillsFound: skills.length }, 'Extracted skills from resume');
        return skills;
    }

    /**
     * Collect bullet points under each recognised heading. Bullets before the
     * first heading, or under an unknown heading, are ignored.
     */
    analyzeJobDescription(text: string): JobDescriptionAnalysis {
        const analysis: JobDescriptionAnalysis = {
            required_skills: [],
            preferred_skills: [],
            responsibilities: [],
            qualifications: []
        };
        let section: JobDescriptionSection | null = null;

        for (const rawLine of text.split(/\r?\n/)) {
            const line = rawLine.trim();
            if (line.length === 0) {
                continue;
            }

            const bullet = BULLET.exec(line);
            if (bullet) {
                if (section) {
                    analysis[section].push(bullet[1].trim());
                }
                continue;
            }

            const heading = SECTION_HEADINGS.find(([pattern]) => pattern.test(line));
            section = heading ? heading[1] : null;
        }

        return analysis;
    }
}
