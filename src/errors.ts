/**
 * Shared error factory for texture synthesizer domain errors.
 *
 * All functions are pure and return the structured MCP error response shape
 * directly, so tool handlers can do:
 *   return errors.materialNotFound(name);
 * Library code throws `new Error(errors.x(...).content[0].text)` instead.
 */

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The client reads the text and can self-correct.
 */
export interface DomainErrorResponse {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
}

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

// ----------------------------------------------------------------------------
// catalog
// ----------------------------------------------------------------------------

export function materialNotFound(name: string): DomainErrorResponse {
    return domainError(`Material '${name}' is not in the catalog. Call texture list to see available materials.`);
}

export function frameOutOfRange(index: number, name: string, count: number): DomainErrorResponse {
    return domainError(`Frame ${String(index)} is out of range. Material '${name}' has ${String(count)} frame(s).`);
}

// ----------------------------------------------------------------------------
// output
// ----------------------------------------------------------------------------

export function cannotWritePath(path: string): DomainErrorResponse {
    return domainError(`Cannot write to path: ${path}`);
}

export function cannotReadTexture(path: string): DomainErrorResponse {
    return domainError(`Cannot read texture file: ${path}`);
}
