import { ZodError } from 'zod';
import { DocxError } from './tools/docx/errors.js';
import type { ServerResult } from './types.js';
import { logToStderr } from './utils/logger.js';

/**
 * Creates a standard error response for tools
 * @param message The error message
 * @param meta Optional machine-readable details (error code, context)
 * @returns A ServerResult with the error message
 */
export function createErrorResponse(message: string, meta?: Record<string, unknown>): ServerResult {
    logToStderr('error', message);
    return {
        content: [{ type: 'text', text: `Error: ${message}` }],
        isError: true,
        ...(meta ? { _meta: meta } : {}),
    };
}

/**
 * Turn anything a tool threw into an error result.  DocxErrors keep their
 * code and context; argument validation failures list the bad fields.
 */
export function errorToResponse(error: unknown, toolName: string): ServerResult {
    if (error instanceof DocxError) {
        return createErrorResponse(error.message, { code: error.code, context: error.context });
    }
    if (error instanceof ZodError) {
        const details = error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        return createErrorResponse(`Invalid arguments for ${toolName}: ${details}`, { code: 'INVALID_ARGUMENTS' });
    }
    const message = error instanceof Error ? error.message : String(error);
    return createErrorResponse(`${toolName} failed: ${message}`);
}
