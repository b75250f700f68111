import { readFile } from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../utils/errors';

/**
 * Read a JSON file and validate it. Relative paths resolve against the
 * working directory; any failure is a ConfigurationError.
 */
export async function loadJsonCatalog<T>(
    filePath: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    configKey: string
): Promise<T> {
    const resolved = path.resolve(filePath);
    let raw: unknown;

    try {
        raw = JSON.parse(await readFile(resolved, 'utf8'));
    } catch (error) {
        throw new ConfigurationError(`Cannot read catalog ${resolved}: ${errorMessage(error)}`, {
            configKey,
            cause: error
        });
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid catalog ${resolved}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`, {
            configKey,
            details: { issues: parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })) }
        });
    }

    return parsed.data;
}
