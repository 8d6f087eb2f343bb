// src/modules/ai/prompts.ts

export const INGREDIENT_CATEGORIES = [
  "protein",
  "vegetable",
  "fruit",
  "grain",
  "dairy",
  "spice",
  "herb",
  "sauce",
  "other",
] as const;

export function buildVisionPrompt(): string {
  return `
Identify every food ingredient visible in this photo and rate how sure you are about each one.

Return STRICT JSON only with EXACT keys:
{
  "ingredients": [
    { "name": string, "confidence": number (0-1), "category": string }
  ],
  "overall_confidence": number (0-1)
}

Rules:
- Output JSON ONLY (no markdown, no extra text)
- List only ingredients you can actually see
- category must be one of: ${INGREDIENT_CATEGORIES.map((c) => `"${c}"`).join(", ")}
- Be specific ("red bell pepper", not "pepper")
- Leave out anything below 0.3 confidence
- If no food is visible, return an empty ingredients array and overall_confidence 0
`.trim();
}

const RECIPE_SHAPE = `
{
  "recipes": [
    {
      "id": string (unique),
      "title": string,
      "ingredients": string[],
      "instructions": string[],
      "cooking_time": number (minutes),
      "servings": number,
      "match_percentage": number (0-100),
      "image_url": string|null,
      "nutrition": {
        "calories": number,
        "protein": number,
        "carbohydrates": number,
        "fat": number,
        "fiber": number,
        "sugar": number,
        "sodium": number,
        "serving_size": string
      },
      "allergens": [{ "name": string, "severity": "low"|"medium"|"high", "description": string }],
      "intolerances": [{ "name": string, "type": "lactose"|"gluten"|"nuts"|"shellfish"|"eggs"|"soy"|"other", "description": string }],
      "used_ingredients": string[],
      "missing_ingredients": string[],
      "difficulty": "easy"|"medium"|"hard"
    }
  ],
  "total_found": number,
  "alternative_suggestions": []
}`.trim();

export function buildRecipeSystemPrompt(): string {
  return `
You are a chef and nutritionist. You write home-cooking recipes from the ingredients a user has on hand.

Always answer with STRICT JSON matching EXACTLY:
${RECIPE_SHAPE}

Rules:
- Output JSON ONLY (no markdown, no extra text)
- Nutrition values are per serving and realistic
- List every likely allergen (nuts, dairy, gluten, shellfish, eggs, soy, ...) and intolerance
- difficulty: "easy" under 30 min with simple technique, "medium" 30-60 min, "hard" over 60 min or advanced technique
- Allergen severity: "low" trace, "medium" moderate, "high" main ingredient
`.trim();
}

export function buildRecipeUserPrompt(ingredients: string[], count: number): string {
  return `
Suggest ${count} recipes using these ingredients: ${ingredients.join(", ")}

Requirements:
- Prefer recipes that use as many of the listed ingredients as possible
- Rank by how many listed ingredients each recipe uses (highest first)
- Give clear step-by-step instructions and realistic cooking times
- If close matches are scarce, put looser ideas in alternative_suggestions
`.trim();
}

export function buildAlternativeRecipePrompt(ingredients: string[], count: number): string {
  return `
The user has: ${ingredients.join(", ")}

Close matches may be limited. Suggest ${count} alternative recipes that:
- Use some of these ingredients without needing all of them
- Lean on common pantry staples
- Cover different cuisines and cooking styles
- Stay practical for a home kitchen
`.trim();
}
