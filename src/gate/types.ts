export type ValidationOutcome = "pass" | "rewritten" | "degraded";

export type ValidationResult = {
  finalText: string;
  estimatedSeconds: number;
  wasModified: boolean;
  outcome: ValidationOutcome;
};

export type ValidationService = {
  readonly budgetSeconds: number;
  validate: (text: unknown, signal?: AbortSignal) => Promise<ValidationResult>;
};
