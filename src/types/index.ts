/**
 * Request/response shapes of the ingredient API. Nothing here outlives a request.
 */

/** Free-form label from the provider; usually one of these but never enforced. */
export type Classification = 'vegan' | 'vegetarian' | 'regular' | (string & {});

export interface ClassificationRequest {
  ingredient: string;
}

export interface ClassificationResult {
  ingredient: string;
  classification: Classification;
}
