export type RiskTolerance = 'conservative' | 'moderate' | 'aggressive';
export type ReportingFrequency = 'daily' | 'weekly' | 'monthly';

export interface VersionRef {
  id: string;
  version: number;
}

export interface MarketContextRef {
  id: string;
  timestamp: string;
}

export interface RiskProfile {
  riskTolerance: RiskTolerance;
  maxDrawdownTolerance: number;
  lossAversionScore: number;
}

export interface UserPreferences {
  explainableOnly: boolean;
  reportingFrequency: ReportingFrequency;
}

export interface UserProfile {
  id: string;
  name: string;
  cohort: string;
  wealthTier: string;
  residenceCountry: string;
  riskProfile: RiskProfile;
  preferences: UserPreferences;
  createdAt: string;
}

export interface GoalConstraints {
  maxDrawdownPct?: number;
  maxSingleAssetWeight?: number;
  excludedSymbols: string[];
}

export interface Goal {
  id: string;
  version: number;
  userId: string;
  description: string;
  targetAmountUsd: number;
  horizonMonths: number;
  constraints: GoalConstraints;
  supersedes: VersionRef | null;
  createdAt: string;
}

export type SignalType = 'trend' | 'opportunity' | 'risk' | 'alert';

export interface MarketSignal {
  symbol: string;
  signalType: SignalType;
  label: string;
  score: number;
  confidence: number;
}

export interface MarketEvent {
  eventType: string;
  description: string;
  timestamp: string;
}

export interface PricePoint {
  ts: string;
  priceUsd: number;
}

export interface MarketContext {
  id: string;
  timestamp: string;
  benchmarkSymbol: string;
  symbols: string[];
  signals: MarketSignal[];
  events: MarketEvent[];
  priceHistory: Record<string, PricePoint[]>;
  createdAt: string;
}

// ─── Strategies ─────────────────────────────────────────────────────────────

export type StrategyStatus = 'proposable' | 'backtest_failed';

export interface Allocation {
  symbol: string;
  weight: number;
}

export interface HypothesisBody {
  family: string;
  allocations: Allocation[];
  cashWeight: number;
  horizonMonths: number;
  rationale: string[];
}

export interface SignalUsage {
  symbol: string;
  signalType: SignalType;
  label: string;
  score: number;
  confidence: number;
}

export interface DriverContribution {
  symbol: string;
  weight: number;
  windowReturn: number;
  contributionShare: number;
}

export interface ExplainabilityTrace {
  summary: string;
  window: { from: string; to: string; bars: number };
  drivers: DriverContribution[];
  signalsUsed: SignalUsage[];
  notes: string[];
}

export interface BacktestMetrics {
  expectedReturn: number;
  maxDrawdown: number;
  confidence: number;
  totalReturn: number;
  volatility: number;
}

export interface BacktestResult {
  id: string;
  strategyRef: VersionRef;
  marketContextRef: MarketContextRef;
  metrics: BacktestMetrics;
  seed: number;
  fingerprint: string;
  window: { from: string; to: string; bars: number };
  explainability: ExplainabilityTrace;
  computedAt: string;
}

export interface BacktestFailure {
  strategyRef: VersionRef;
  code: string;
  message: string;
  details: Record<string, unknown>;
  recordedAt: string;
}

export interface Strategy {
  id: string;
  version: number;
  userId: string;
  goalRef: VersionRef;
  marketContextRef: MarketContextRef;
  family: string;
  hypothesis: HypothesisBody;
  explainability: ExplainabilityTrace | null;
  backtestResultId: string | null;
  status: StrategyStatus;
  supersedes: VersionRef | null;
  policySnapshotVersion: number | null;
  note?: string;
  createdAt: string;
}

// ─── Decisions & execution ─────────────────────────────────────────────────

export type DecisionOutcome = 'accepted' | 'modified' | 'rejected';
export type DecisionState = 'proposed' | DecisionOutcome;

export interface Decision {
  id: string;
  strategyRef: VersionRef;
  userId: string;
  family: string;
  parentDecisionId: string | null;
  proposedAt: string;
}

export interface DecisionOutcomeRecord {
  decisionId: string;
  outcome: DecisionOutcome;
  reasonCode?: string;
  note?: string;
  modifiedStrategyRef?: VersionRef;
  followUpDecisionId?: string;
  executionTraceId?: string;
  decidedAt: string;
}

export interface DecisionView extends Decision {
  state: DecisionState;
  outcome: DecisionOutcomeRecord | null;
}

export type ExecutionActionType = 'buy' | 'sell' | 'rebalance' | 'note';

export interface ExecutionAction {
  type: ExecutionActionType;
  symbol?: string;
  quantity?: number;
  priceUsd?: number;
  notionalUsd?: number;
  externalRef?: string;
}

export type TraceEventKind = 'action' | 'compensation' | 'completion';

export interface TraceEvent {
  seq: number;
  kind: TraceEventKind;
  at: string;
  action?: ExecutionAction;
  compensates?: number;
  reason?: string;
}

export interface ExecutionTraceHeader {
  id: string;
  decisionId: string;
  originDecisionIds: string[];
  strategyRef: VersionRef;
  userId: string;
  family: string;
  startedAt: string;
}

export interface ExecutionTrace extends ExecutionTraceHeader {
  actions: TraceEvent[];
  completedAt: string | null;
}

// ─── Performance & learning ────────────────────────────────────────────────

export interface PerformanceMetrics {
  alpha: number;
  drawdown: number;
  trustScore: number;
  acceptanceRate: number;
}

export type PerformanceMetricName = keyof PerformanceMetrics;

export interface UserFeedback {
  rating: number;
  comment?: string;
}

export type EvaluationKind = 'interim' | 'final';

export interface PortfolioPerformance {
  id: string;
  executionTraceId: string;
  strategyRef: VersionRef;
  family: string;
  userId: string;
  kind: EvaluationKind;
  metrics: PerformanceMetrics;
  realizedReturn: number;
  benchmarkReturn: number;
  feedback?: UserFeedback;
  asOf: string;
  recordedAt: string;
}

export type LearningDimension = 'family' | 'cohort';

export interface LearningContribution {
  asOf: string;
  metrics: PerformanceMetrics;
}

export interface LearningMetricsRecord {
  key: string;
  dimension: LearningDimension;
  subject: string;
  window: string;
  sampleSize: number;
  means: PerformanceMetrics;
  contributions: Record<string, LearningContribution>;
  revision: number;
  updatedAt: string;
}

export interface FamilyLearning extends PerformanceMetrics {
  window: string;
  sampleSize: number;
}

export interface LearningSnapshot {
  version: number;
  takenAt: string;
  families: Record<string, FamilyLearning>;
}

// ─── Store ──────────────────────────────────────────────────────────────────

export type EntityType =
  | 'profile'
  | 'goal'
  | 'market_context'
  | 'strategy'
  | 'backtest'
  | 'backtest_failure'
  | 'decision'
  | 'decision_outcome'
  | 'execution_trace'
  | 'trace_event'
  | 'performance'
  | 'learning_metrics';

export type AuditAction = 'insert' | 'version' | 'append' | 'aggregate';

export interface AuditEntry {
  seq: number;
  at: string;
  entity: EntityType;
  key: string;
  action: AuditAction;
}

export interface MetricsState {
  startedAt: string;
  strategiesProposed: number;
  strategiesForked: number;
  backtestFailures: number;
  decisionsOpened: number;
  decisionsByOutcome: Record<DecisionOutcome, number>;
  evaluationsRecorded: number;
}

export interface AppState {
  profiles: Record<string, UserProfile>;
  goals: Record<string, Goal[]>;
  marketContexts: Record<string, MarketContext>;
  strategies: Record<string, Strategy[]>;
  backtests: Record<string, BacktestResult>;
  backtestFailures: Record<string, BacktestFailure>;
  decisions: Record<string, Decision>;
  decisionOutcomes: Record<string, DecisionOutcomeRecord>;
  executionTraces: Record<string, ExecutionTraceHeader>;
  traceEvents: Record<string, TraceEvent[]>;
  performance: Record<string, PortfolioPerformance[]>;
  learningMetrics: Record<string, LearningMetricsRecord>;
  auditLog: AuditEntry[];
  metrics: MetricsState;
}

export interface RuntimeMetrics {
  uptimeSeconds: number;
  policySnapshotVersion: number;
  processPid: number;
}
