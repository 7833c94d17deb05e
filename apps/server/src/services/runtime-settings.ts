import type { ThresholdComparison } from "@speakercheck/shared";

export interface DecisionSettings {
  threshold: number;
  comparison: ThresholdComparison;
}

/**
 * Decision settings that POST /config may change while the server runs.
 * Model identity lives with the model coordinator, not here.
 */
export class RuntimeSettings {
  private current: DecisionSettings;

  constructor(initial: DecisionSettings) {
    this.current = { ...initial };
  }

  snapshot(): DecisionSettings {
    return { ...this.current };
  }

  update(changes: Partial<DecisionSettings>): DecisionSettings {
    this.current = {
      threshold: changes.threshold ?? this.current.threshold,
      comparison: changes.comparison ?? this.current.comparison,
    };
    return this.snapshot();
  }
}
