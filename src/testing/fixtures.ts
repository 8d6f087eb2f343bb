import type { ChatJsonRequest, ChatJsonTransport } from "../modules/ai/openai-chat";
import type { Recipe } from "../modules/recipes/types";

export function recipe(overrides: Partial<Recipe> = {}): Recipe {
  return {
    id: "r1",
    title: "Egg fried rice",
    ingredients: ["2 eggs", "1 cup rice", "soy sauce"],
    instructions: ["Cook rice", "Scramble eggs", "Fry together"],
    cookingTimeMin: 20,
    servings: 2,
    matchPercentage: 50,
    imageUrl: null,
    nutrition: {
      calories: 420,
      protein: 14,
      carbohydrates: 60,
      fat: 12,
      fiber: 2,
      sugar: 1,
      sodium: 700,
      servingSize: "1 bowl",
    },
    allergens: [],
    intolerances: [],
    usedIngredients: [],
    missingIngredients: [],
    difficulty: "easy",
    ...overrides,
  };
}

/** Snake-case recipe as the model returns it. */
export function recipePayload(overrides: Record<string, unknown> = {}) {
  return {
    id: "r1",
    title: "Egg fried rice",
    ingredients: ["2 eggs", "1 cup rice", "soy sauce"],
    instructions: ["Cook rice", "Scramble eggs", "Fry together"],
    cooking_time: 20,
    servings: 2,
    match_percentage: 95,
    image_url: null,
    nutrition: {
      calories: 420,
      protein: 14,
      carbohydrates: 60,
      fat: 12,
      fiber: 2,
      sugar: 1,
      sodium: 700,
      serving_size: "1 bowl",
    },
    allergens: [{ name: "Eggs", severity: "high", description: "Contains egg" }],
    intolerances: [],
    used_ingredients: [],
    missing_ingredients: [],
    difficulty: "Easy",
    ...overrides,
  };
}

/** Transport that answers from a queue; an Error in the queue is thrown instead. */
export class ScriptedTransport implements ChatJsonTransport {
  readonly requests: ChatJsonRequest[] = [];
  private readonly answers: unknown[];

  constructor(...answers: unknown[]) {
    this.answers = answers;
  }

  get calls() {
    return this.requests.length;
  }

  async completeJson(req: ChatJsonRequest): Promise<unknown> {
    this.requests.push(req);
    const next = this.answers.length > 1 ? this.answers.shift() : this.answers[0];
    if (next instanceof Error) throw next;
    return next;
  }
}
