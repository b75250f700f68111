import type { DataSource } from 'typeorm';
import { InterviewCoordinator, createAgents } from './agents/coordinator';
import type { AppConfig } from './config/env';
import type { ILogger } from './config/logger';
import { Employee } from './db/entities/employee.entity';
import { Evaluation } from './db/entities/evaluation.entity';
import { Interview } from './db/entities/interview.entity';
import { Question } from './db/entities/question.entity';
import type { IEvaluationQueue } from './queue/queue-config';
import { EmployeeRepository } from './repositories/employee.repository';
import { EvaluationRepository } from './repositories/evaluation.repository';
import { InterviewRepository } from './repositories/interview.repository';
import { QuestionRepository } from './repositories/question.repository';
import { AnalyticsService } from './services/analytics.service';
import { DocumentProcessorService } from './services/document-processor.service';
import { EmployeeDirectoryService } from './services/employee-directory.service';
import type { ITextGenerator } from './agents/types';

export interface Repositories {
    employees: EmployeeRepository;
    interviews: InterviewRepository;
    questions: QuestionRepository;
    evaluations: EvaluationRepository;
}

/**
 * Everything the HTTP routes and the worker need, built once at start-up.
 */
export interface AppContainer {
    logger: ILogger;
    repositories: Repositories;
    directory: EmployeeDirectoryService;
    analytics: AnalyticsService;
    documents: DocumentProcessorService;
    coordinator: InterviewCoordinator;
    evaluationQueue: IEvaluationQueue;
    isDatabaseReady(): boolean;
}

export interface ContainerDependencies {
    config: AppConfig;
    dataSource: DataSource;
    generator: ITextGenerator;
    evaluationQueue: IEvaluationQueue;
    logger: ILogger;
}

export async function createContainer({
    config,
    dataSource,
    generator,
    evaluationQueue,
    logger
}: ContainerDependencies): Promise<AppContainer> {
    const repositories: Repositories = {
        employees: new EmployeeRepository(dataSource.getRepository(Employee), logger),
        interviews: new InterviewRepository(dataSource.getRepository(Interview), logger),
        questions: new QuestionRepository(dataSource.getRepository(Question), logger),
        evaluations: new EvaluationRepository(dataSource.getRepository(Evaluation), logger)
    };

    const directory = await EmployeeDirectoryService.create(
        repositories.employees,
        repositories.questions,
        config.catalogs.jobRequirementsPath,
        logger.child({ service: 'employee-directory' })
    );
    const analytics = new AnalyticsService(
        repositories.interviews,
        repositories.evaluations,
        logger.child({ service: 'analytics' })
    );
    const documents = await DocumentProcessorService.create(
        config.catalogs.skillsVocabularyPath,
        logger.child({ service: 'document-processor' })
    );

    const agents = createAgents({ directory, benchmarks: analytics, generator, logger });
    const coordinator = new InterviewCoordinator(agents, logger);

    return {
        logger,
        repositories,
        directory,
        analytics,
        documents,
        coordinator,
        evaluationQueue,
        isDatabaseReady: () => dataSource.isInitialized
    };
}
