export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface SentinelConfig {
  readonly logging: LoggingConfig;
  readonly policy: PolicyConfig;
  readonly reasoning: ReasoningConfig;
  readonly analysis: AnalysisConfig;
  readonly mitigation: MitigationConfig;
  readonly memory: MemoryConfig;
  readonly advisor: AdvisorConfig;
  readonly server: ServerConfig;
}

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly file?: string;
  readonly json?: boolean;
}

export interface SensitivePatternConfig {
  readonly name: string;
  readonly pattern: string;
  readonly flags: string;
}

export interface ThresholdConfig {
  /** Lowest score classified LOW_RISK. Scores below it are APPROVED. */
  readonly low: number;
  readonly medium: number;
  readonly high: number;
  readonly critical: number;
}

export interface OverrideConfig {
  readonly payloadSizeThresholdKb: number;
  readonly highSensitivityPatterns: string[];
  /** Pattern sets that are high-sensitivity only when all members match. */
  readonly piiCombinations: string[][];
}

export interface PolicyConfig {
  readonly approvedDomains: string[];
  readonly externalAiServices: string[];
  readonly maliciousDomains: string[];
  readonly sensitivePatterns: SensitivePatternConfig[];
  readonly departmentWeights: Record<string, number>;
  readonly defaultDepartmentWeight: number;
  readonly thresholds: ThresholdConfig;
  readonly override: OverrideConfig;
}

export type ReasoningProvider = "openai" | "ollama";

export interface ReasoningConfig {
  readonly provider: ReasoningProvider;
  readonly model: string;
  readonly apiKey?: string;
  readonly baseUrl?: string;
  readonly timeoutMs: number;
  readonly temperature: number;
  readonly maxTokens: number;
}

export interface AnalysisConfig {
  readonly concurrency: number;
}

export type AlertFormat = "slack" | "teams" | "generic";

export interface AlertWebhookConfig {
  readonly channel: string;
  readonly url: string;
  readonly format: AlertFormat;
}

export interface MitigationConfig {
  readonly securityChannel: string;
  readonly firewallWebhookUrl?: string;
  readonly alertWebhooks: AlertWebhookConfig[];
  readonly requestTimeoutMs: number;
  readonly retryDelayMs: number;
}

export interface MemoryConfig {
  readonly dimension: number;
  readonly snapshotPath?: string;
}

export interface AdvisorConfig {
  readonly topK: number;
  readonly historyTurns: number;
  readonly persona?: string;
}

export interface ServerConfig {
  readonly port: number;
  readonly hostname: string;
}
