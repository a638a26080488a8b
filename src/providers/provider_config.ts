import { CATEGORY_CONFIG } from "../contracts/categories";
import type { Category } from "../contracts/pipeline";

export type ModelRole = "classifier" | "name_extractor" | "outstanding" | "generator" | "judge";

export const MODEL_ROLES: readonly ModelRole[] = [
  "classifier",
  "name_extractor",
  "outstanding",
  "generator",
  "judge",
];

export type ModelOverrides = Partial<Record<ModelRole | "default", string>>;

export type ModelSelection = {
  model: string;
  source: "default" | "category" | "env";
  reasoningEffort: string | null;
};

type SelectModelArgs = {
  role: ModelRole;
  category?: Category;
  overrides?: ModelOverrides;
};

const DEFAULTS_BY_ROLE: Record<ModelRole, string> = {
  classifier: "gpt-5-mini",
  name_extractor: "gpt-5-nano",
  outstanding: "gpt-5-mini",
  generator: "gpt-5.1",
  judge: "gpt-5.1",
};

/**
 * Role override beats the global override; the generator otherwise follows its
 * category config. Reasoning effort only comes from the category config and is
 * dropped once a model is overridden.
 */
export function selectModel(args: SelectModelArgs): ModelSelection {
  const envModel = args.overrides?.[args.role] || args.overrides?.default;
  if (envModel) {
    return { model: envModel, source: "env", reasoningEffort: null };
  }

  if (args.role === "generator" && args.category) {
    const config = CATEGORY_CONFIG[args.category];
    return { model: config.model, source: "category", reasoningEffort: config.reasoningEffort };
  }

  return { model: DEFAULTS_BY_ROLE[args.role], source: "default", reasoningEffort: null };
}

// SUPPORT_MODEL_<ROLE> / SUPPORT_MODEL_DEFAULT
export function modelOverridesFromEnv(env: NodeJS.ProcessEnv): ModelOverrides {
  const overrides: ModelOverrides = {};
  if (env.SUPPORT_MODEL_DEFAULT) overrides.default = env.SUPPORT_MODEL_DEFAULT;
  for (const role of MODEL_ROLES) {
    const value = env[`SUPPORT_MODEL_${role.toUpperCase()}`];
    if (value) overrides[role] = value;
  }
  return overrides;
}
