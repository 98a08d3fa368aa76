/** Marker used in tuple keys for combinations without domain grounding. */
export const NO_DOMAIN = "none";

/**
 * The identity of a Combination: `model::instruction::query::domain`.
 * Two combinations with the same key are the same combination.
 */
export function tupleKey(
    modelId: string,
    instructionId: string,
    queryId: string,
    domainId: string | null,
): string {
    return `${modelId}::${instructionId}::${queryId}::${domainId ?? NO_DOMAIN}`;
}
