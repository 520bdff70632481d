import type { RiskCategory } from "../analysis/types.js";

export interface SensitivePattern {
  readonly name: string;
  readonly regex: RegExp;
}

export interface Thresholds {
  readonly low: number;
  readonly medium: number;
  readonly high: number;
  readonly critical: number;
}

export interface OverrideRule {
  readonly payloadSizeThresholdKb: number;
  readonly highSensitivityPatterns: ReadonlySet<string>;
  readonly piiCombinations: readonly (readonly string[])[];
}

export interface PolicyContext {
  readonly approvedDomains: ReadonlySet<string>;
  readonly externalAiServices: ReadonlySet<string>;
  readonly maliciousDomains: ReadonlySet<string>;
  readonly sensitivePatterns: readonly SensitivePattern[];
  readonly departmentWeights: ReadonlyMap<string, number>;
  readonly defaultDepartmentWeight: number;
  readonly thresholds: Thresholds;
  readonly override: OverrideRule;
}

export interface CategoryRationale {
  readonly category: RiskCategory;
  readonly description: string;
  readonly action: string;
  readonly scoreRange: readonly [number, number];
}
