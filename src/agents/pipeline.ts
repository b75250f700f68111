import { AppError, ExternalServiceError, NotFoundError, errorMessage } from '../utils/errors';
import type { ErrorDetails } from '../utils/errors';
import { validateStageContext } from './context-assembler';
import type {
    AgentCollaborators,
    AgentDefinition,
    AgentName,
    GatheredContext,
    StageContext,
    StageOutcome,
    Structurer
} from './types';

/**
 * Run a collaborator call on behalf of a stage.
 *
 * Taxonomy errors keep their class and gain the stage context; anything else
 * becomes an ExternalServiceError carrying the original as `cause`.
 */
async function callCollaborator<T>(
    service: string,
    context: ErrorDetails,
    operation: () => Promise<T>
): Promise<T> {
    try {
        return await operation();
    } catch (error) {
        if (error instanceof AppError) {
            throw error.withContext(context);
        }
        throw new ExternalServiceError(`${service} failed: ${errorMessage(error)}`, {
            service,
            cause: error,
            details: context
        });
    }
}

/**
 * The single stage pipeline every agent runs through:
 * validate → look up profile, requirements and benchmarks → build prompt →
 * generate → structure → score → envelope.
 */
export async function runAgent<TContext extends StageContext, TPayload, TResult>(
    definition: AgentDefinition<TContext, TPayload, TResult>,
    collaborators: AgentCollaborators,
    input: Record<string, unknown>
): Promise<StageOutcome<TResult>> {
    const validated = validateStageContext(definition.name, definition.requiredFields, definition.schema, input);
    if (!validated.ok) {
        collaborators.logger.warn(
            { agent: definition.name, details: validated.error.details },
            'Stage input rejected'
        );
        return validated;
    }

    const context = validated.value;
    const stageDetails: ErrorDetails = {
        stage: definition.name,
        employee_id: context.employee_id,
        ...(context.interview_id ? { interview_id: context.interview_id } : {})
    };
    const log = collaborators.logger.child({ agent: definition.name, ...stageDetails });

    log.info({}, 'Stage started');

    const profile = await callCollaborator('employee-directory', stageDetails, () =>
        collaborators.directory.getEmployeeProfile(context.employee_id)
    );
    if (!profile) {
        log.warn({}, 'Employee not found');
        return {
            ok: false,
            error: new NotFoundError(`Employee ${context.employee_id} not found`, {
                resourceType: 'Employee',
                resourceId: context.employee_id,
                details: { stage: definition.name }
            })
        };
    }

    const jobRequirements = definition.lookups.jobRequirements
        ? await callCollaborator('employee-directory', stageDetails, () =>
            collaborators.directory.getJobRequirements(profile.position, profile.department)
        )
        : null;

    const benchmarks = await callCollaborator('benchmarks', stageDetails, () =>
        collaborators.benchmarks.getDepartmentBenchmarks(profile.department)
    );

    const gathered: GatheredContext = { profile, jobRequirements, benchmarks };
    const prompt = definition.buildPrompt(context, gathered);

    log.debug({ promptLength: prompt.length }, 'Calling text generation');
    const rawText = await callCollaborator('text-generation', stageDetails, () =>
        collaborators.generator.generate(definition.instructions, prompt)
    );

    const payload = definition.structure(rawText, context, gathered);
    const score = definition.score(payload);

    log.info({ score }, 'Stage completed');

    return { ok: true, value: definition.envelope(payload, score, context) };
}

/**
 * Swap the structurer of a definition, leaving everything else as is.
 */
export function withStructurer<TContext extends StageContext, TPayload, TResult>(
    definition: AgentDefinition<TContext, TPayload, TResult>,
    structure: Structurer<TContext, TPayload>
): AgentDefinition<TContext, TPayload, TResult> {
    return { ...definition, structure };
}

/**
 * A definition bound to its collaborators.
 */
export class Agent<TContext extends StageContext, TPayload, TResult> {
    constructor(
        private readonly definition: AgentDefinition<TContext, TPayload, TResult>,
        private readonly collaborators: AgentCollaborators
    ) {}

    get name(): AgentName {
        return this.definition.name;
    }

    get requiredFields(): readonly string[] {
        return this.definition.requiredFields;
    }

    process(input: Record<string, unknown>): Promise<StageOutcome<TResult>> {
        return runAgent(this.definition, this.collaborators, input);
    }
}

