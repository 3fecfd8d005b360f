import * as errors from '../errors.js';

/**
 * The text-only tool result shape every handler returns.
 */
export type ToolResponse = {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
};

export function jsonResponse(payload: unknown): ToolResponse {
    return {
        content: [{ type: 'text', text: JSON.stringify(payload) }],
    };
}

/**
 * Maps a failed file load to an error response. Decode failures keep their
 * kind and field path; read failures keep the io message.
 */
export function loadFailure(error: unknown): errors.DomainErrorResponse {
    if (error instanceof errors.SchemaError) {
        return errors.schemaErrorResponse(error);
    }
    if (error instanceof Error) {
        return errors.domainError(error.message);
    }
    return errors.domainError(String(error));
}

/**
 * Result of the `validate` actions: decode failures are reported as data,
 * not as tool errors.
 */
export function validationReport(error: errors.SchemaError): ToolResponse {
    return jsonResponse({
        valid: false,
        kind: error.kind,
        path: error.path ?? null,
        message: error.message,
    });
}
