import type { AppEnv } from "./env";

export function hasOpenAIKey(env: Pick<AppEnv, "OPENAI_API_KEY">): boolean {
  return Boolean(env.OPENAI_API_KEY);
}

export function requireOpenAIKey(env: Pick<AppEnv, "OPENAI_API_KEY">): string {
  const k = env.OPENAI_API_KEY;
  if (!k) throw new Error("OPENAI_API_KEY_MISSING");
  return k;
}
