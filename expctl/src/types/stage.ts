/** Pipeline stage kinds, in dependency order. */
export const STAGE_KINDS = ["corpus", "sample", "config", "experiment"] as const;

export type StageKind = (typeof STAGE_KINDS)[number];

/** Stage kinds that other stages may depend on. */
export type DependencyName = Exclude<StageKind, "experiment">;

export function isStageKind(value: string): value is StageKind {
  return STAGE_KINDS.some((kind) => kind === value);
}

export function isDependencyName(value: string): value is DependencyName {
  return value === "corpus" || value === "sample" || value === "config";
}

/** Which sample, config and experiment instances are wired together. */
export type StageSelection = {
  sample?: string;
  config?: string;
  experiment?: string;
};
