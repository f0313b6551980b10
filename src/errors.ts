/**
 * Error taxonomy shared by every layer.
 *
 * Consultations never throw: these codes travel in failure responses
 * (`metadata.error_code`) and stop results. The classes are thrown only where a
 * caller has to react, such as a rejected registration or an unparseable issue.
 */

export type ErrorCode =
  | 'NO_AGENT_AVAILABLE'
  | 'CAPACITY_EXCEEDED'
  | 'AGENT_PROCESSING_ERROR'
  | 'FAILOVER_EXHAUSTED'
  | 'VALIDATION_FAILED'
  | 'LOOP_DETECTED'
  | 'PARSE_FAILURE'
  | 'REGISTRATION_REJECTED'
  | 'CONFIG_INVALID';

export class CoreError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'CoreError';
  }
}

export class AgentRegistrationError extends CoreError {
  constructor(
    public readonly agentId: string,
    message: string,
  ) {
    super('REGISTRATION_REJECTED', message);
    this.name = 'AgentRegistrationError';
  }
}

export class IssueParseError extends CoreError {
  constructor(message: string) {
    super('PARSE_FAILURE', message);
    this.name = 'IssueParseError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
