/**
 * Ingredient classification prompt. The ingredient is substituted verbatim;
 * JSON encoding of the request body is left to the SDK.
 */

export const INGREDIENT_CLASSIFICATION_PROMPT =
  "Classify the ingredient '{{ingredient}}' as vegan, vegetarian, or regular. Respond in JSON format.";

export function buildIngredientPrompt(ingredient: string): string {
  // Replacer function so `$` sequences in the ingredient are not treated as patterns.
  return INGREDIENT_CLASSIFICATION_PROMPT.replace('{{ingredient}}', () => ingredient);
}
