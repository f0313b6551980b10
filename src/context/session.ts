/**
 * Per-session working memory: task, decisions, files, integration points and
 * next steps. A session is stale once idle longer than the session timeout.
 */

export interface SessionSnapshot {
  session_id: string;
  created_at: string;
  last_updated: string;
  task_objective: string;
  architectural_decisions: Record<string, string>;
  accessed_files: string[];
  integration_points: string[];
  next_steps: string[];
}

export class SessionContext {
  readonly created_at: number;
  last_updated: number;
  task_objective: string;
  readonly architectural_decisions = new Map<string, string>();
  private readonly files: string[] = [];
  private readonly integrationPoints: string[] = [];
  private nextSteps: string[] = [];

  constructor(
    readonly session_id: string,
    taskObjective = 'Unknown task',
    now = Date.now(),
  ) {
    this.task_objective = taskObjective;
    this.created_at = now;
    this.last_updated = now;
  }

  get accessed_files(): readonly string[] { return this.files; }
  get integration_points(): readonly string[] { return this.integrationPoints; }
  get next_steps(): readonly string[] { return this.nextSteps; }

  touch(now = Date.now()): void {
    this.last_updated = now;
  }

  isStale(timeoutMs: number, now = Date.now()): boolean {
    return now - this.last_updated > timeoutMs;
  }

  recordDecision(key: string, value: string): void {
    this.architectural_decisions.set(key, value);
  }

  recordFile(path: string): void {
    if (!this.files.includes(path)) this.files.push(path);
  }

  recordIntegrationPoint(point: string): void {
    if (!this.integrationPoints.includes(point)) this.integrationPoints.push(point);
  }

  /** Merges decisions, replaces next steps, refreshes the session. */
  updateProgress(
    task: string | null,
    decisions: Record<string, string> = {},
    nextSteps: string[] = [],
    now = Date.now(),
  ): void {
    if (task) this.task_objective = task;
    for (const [k, v] of Object.entries(decisions)) this.architectural_decisions.set(k, v);
    this.nextSteps = [...nextSteps];
    this.touch(now);
  }

  toJSON(): SessionSnapshot {
    return {
      session_id: this.session_id,
      created_at: new Date(this.created_at).toISOString(),
      last_updated: new Date(this.last_updated).toISOString(),
      task_objective: this.task_objective,
      architectural_decisions: Object.fromEntries(this.architectural_decisions),
      accessed_files: [...this.files],
      integration_points: [...this.integrationPoints],
      next_steps: [...this.nextSteps],
    };
  }
}
