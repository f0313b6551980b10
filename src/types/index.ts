/**
 * Core type definitions for the consultation core.
 *
 * Organized into: Agents, Consultation, Failover, Context, Story, Audit, Tools.
 * Configuration types are inferred from the zod schema in config.ts.
 */

// ---------------------------------------------------------------------------
// Agents
// ---------------------------------------------------------------------------

export type HealthState = 'HEALTHY' | 'DEGRADED' | 'UNHEALTHY' | 'UNKNOWN';

export interface HealthStatus {
  state: HealthState;
  message: string;
  checked_at: string;
}

export interface PerformanceSpec {
  response_time_ms: number;
  accuracy_threshold: number;
  availability_threshold: number;
  max_concurrent_requests: number;
  cache_timeout_ms: number;
}

export type PerformanceTier = 'default' | 'high' | 'critical';

export interface AgentMetrics {
  agent_id: string;
  total_requests: number;
  successful_requests: number;
  failed_requests: number;
  average_response_time_ms: number;
  max_response_time_ms: number;
  /** successful / total, 1.0 before the first request */
  current_accuracy: number;
  /** 1.0 while health is HEALTHY or DEGRADED, else 0.0 */
  availability: number;
  active_requests: number;
  last_updated: string;
}

// ---------------------------------------------------------------------------
// Consultation
// ---------------------------------------------------------------------------

export type RequestPriority = 'LOW' | 'NORMAL' | 'HIGH' | 'CRITICAL';

export type ContextValue = string | number | boolean | null | string[] | Record<string, string>;

export interface ConsultationRequest {
  readonly request_id: string;
  readonly domain: string;
  readonly query: string;
  readonly context: Readonly<Record<string, ContextValue>>;
  readonly requester_id: string;
  readonly timestamp: string;
  readonly priority: RequestPriority;
}

export type ResponseStatus = 'SUCCESS' | 'PARTIAL_SUCCESS' | 'FAILURE' | 'TIMEOUT';

export interface GuidanceResponse {
  response_id: string;
  request_id: string;
  agent_id: string;
  guidance: string;
  confidence: number;
  recommendations: string[];
  processing_time_ms: number;
  timestamp: string;
  status: ResponseStatus;
  metadata: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Failover
// ---------------------------------------------------------------------------

export type FailoverStatus = 'HEALTHY' | 'FAILED' | 'RECOVERING';

export interface FailoverState {
  agent_id: string;
  status: FailoverStatus;
  consecutive_failures: number;
  total_failures: number;
  total_recoveries: number;
  last_failure_at: string | null;
  last_recovery_at: string | null;
  failure_reason: string | null;
}

export interface FailoverStatistics {
  total_agents: number;
  failed_agents: number;
  total_failures: number;
  total_recoveries: number;
  /** failed / total, 0 with no agents */
  failure_rate: number;
  /** recoveries / failures, 1.0 with no failures */
  recovery_rate: number;
  timestamp: string;
}

export interface RegistryHealth {
  total_agents: number;
  available_agents: number;
  unhealthy_agents: number;
  availability: number;
}

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

export type ContextFamily = 'event-driven' | 'cicd' | 'configuration' | 'resilience';

export interface ContextValidationResult {
  sufficient: boolean;
  missing_inputs: string[];
  missing_decisions: string[];
  validation_time_ms: number;
}

export interface ContextMarker {
  category: string;
  value: string;
}

// ---------------------------------------------------------------------------
// Story
// ---------------------------------------------------------------------------

export interface GitHubIssue {
  title: string;
  body: string;
  labels: string[];
  repository: string;
  number: number;
}

export interface IssueSection {
  heading: string;
  level: number;
  content: string;
}

export interface ParsedIssue {
  metadata: {
    title: string;
    labels: string[];
    repository: string;
    number: number;
  };
  body: string;
  sections: IssueSection[];
}

export type EarsPattern = 'UBIQUITOUS' | 'STATE_DRIVEN' | 'EVENT_DRIVEN' | 'UNWANTED';

export interface Requirement {
  text: string;
  pattern: EarsPattern;
  verifiable: boolean;
}

export interface OpenQuestion {
  question: string;
  why_it_matters: string;
  impact: string;
}

export interface DataRequirement {
  name: string;
  description: string;
  required: boolean;
}

export type UnsafeDomain = 'legal' | 'financial' | 'security' | 'regulatory';

export interface AnalysisResult {
  intent: string;
  actors: string[];
  stakeholders: string[];
  preconditions: Requirement[];
  functional_requirements: Requirement[];
  error_flows: Requirement[];
  business_rules: string[];
  data_requirements: DataRequirement[];
  open_questions: OpenQuestion[];
  unsafe_domains: UnsafeDomain[];
}

export interface GherkinScenario {
  name: string;
  given: string[];
  when: string[];
  then: string[];
}

export interface TransformedRequirements {
  header: string;
  intent: string;
  actors: string[];
  preconditions: string[];
  functional_requirements: string[];
  alternate_flows: string[];
  business_rules: string[];
  data_requirements: string[];
  acceptance_criteria: GherkinScenario[];
  observability: string[];
  open_questions: OpenQuestion[];
}

export type ValidationResult =
  | { valid: true }
  | { valid: false; stop_phrase: string; reason: string };

export type ProcessingResult =
  | { success: true; output: string }
  | { success: false; stop_phrase: string; reason: string; code: 'VALIDATION_FAILED' | 'PARSE_FAILURE' | 'LOOP_DETECTED' };

export interface LoopDetectionResult {
  loop_detected: boolean;
  stop_phrase: string | null;
  details: string | null;
}

// ---------------------------------------------------------------------------
// Audit
// ---------------------------------------------------------------------------

export type AuditAction =
  | 'agent.registered'
  | 'agent.failed' | 'agent.recovered'
  | 'failover.exhausted'
  | 'session.archived' | 'session.cleaned'
  | 'story.stopped' | 'story.completed';

export interface AuditEntry {
  entry_id: string;
  action: AuditAction;
  actor: string;
  target_type: string;
  target_id: string;
  details: Record<string, unknown>;
  timestamp: string;
  correlation_id: string;
}

// ---------------------------------------------------------------------------
// Tool output
// ---------------------------------------------------------------------------

export interface ToolOutput {
  status: 'success' | 'error' | 'stopped' | 'needs_input';
  data: Record<string, unknown>;
  message: string;
  next: {
    control: 'agent' | 'user';
    description: string;
  } | null;
}
