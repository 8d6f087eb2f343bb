import { z } from "zod";
import type { AppError } from "../../errors";

export const IngredientSchema = z.object({
  name: z.string().min(1),
  confidence: z.number().min(0).max(1),
  category: z.string().min(1),
});

export type Ingredient = z.infer<typeof IngredientSchema>;

export const VisionSuccessSchema = z.object({
  success: z.literal(true),
  ingredients: z.array(IngredientSchema),
  overallConfidence: z.number().min(0).max(1),
  processingTimeMs: z.number().nonnegative(),
  fromCache: z.boolean(),
});

export type VisionSuccess = z.infer<typeof VisionSuccessSchema>;

export type VisionFailure = {
  success: false;
  ingredients: [];
  overallConfidence: 0;
  processingTimeMs: number;
  fromCache: false;
  error: AppError;
  errorMessage: string;
};

export type VisionResult = VisionSuccess | VisionFailure;
