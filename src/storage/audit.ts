/**
 * Append-only audit log: JSONL file under <storage.base_path>/audit.
 * Hash-chained for tamper evidence: each line carries sha256(entry + previous hash).
 * Writes are best-effort: a failed write is logged and recordAudit returns null.
 */

import { appendFileSync, mkdirSync, existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createHash, randomUUID } from 'node:crypto';
import { z } from 'zod';
import { getConfig } from '../config.js';
import { logger } from '../logger.js';
import type { AuditEntry, AuditAction } from '../types/index.js';

const log = logger.child({ component: 'audit' });

const GENESIS = '0'.repeat(64);

const AuditLineSchema = z.object({
  entry_id: z.string(),
  action: z.enum([
    'agent.registered', 'agent.failed', 'agent.recovered', 'failover.exhausted',
    'session.archived', 'session.cleaned', 'story.stopped', 'story.completed',
  ]),
  actor: z.string(),
  target_type: z.string(),
  target_id: z.string(),
  details: z.record(z.unknown()),
  timestamp: z.string(),
  correlation_id: z.string(),
  h: z.string(),
});

type AuditLine = z.infer<typeof AuditLineSchema>;

function auditDir(): string {
  return join(getConfig().storage.base_path, 'audit');
}

function auditFile(): string { return join(auditDir(), 'audit.jsonl'); }

/** Hash of the last line written by this process, per file. Single writer per file. */
let tail: { file: string; h: string } | null = null;

function previousHash(file: string): string {
  if (tail?.file === file) return tail.h;
  const lines = readLines();
  return lines.length > 0 ? lines[lines.length - 1].h : GENESIS;
}

function readLines(): AuditLine[] {
  const f = auditFile();
  if (!existsSync(f)) return [];
  const lines: AuditLine[] = [];
  for (const raw of readFileSync(f, 'utf-8').split('\n')) {
    if (!raw.trim()) continue;
    try {
      const parsed = AuditLineSchema.safeParse(JSON.parse(raw));
      if (parsed.success) lines.push(parsed.data);
      else log.warn({ file: f }, 'Skipping malformed audit line');
    } catch (err) {
      log.warn({ file: f, err }, 'Skipping unreadable audit line');
    }
  }
  return lines;
}

function stripHash(line: AuditLine): AuditEntry {
  const { h: _h, ...entry } = line;
  return entry;
}

function hashEntry(entry: AuditEntry, prev: string): string {
  return createHash('sha256').update(JSON.stringify(entry) + prev).digest('hex');
}

export function recordAudit(
  action: AuditAction, actor: string,
  targetType: string, targetId: string,
  details: Record<string, unknown> = {},
  correlationId?: string,
): AuditEntry | null {
  if (!getConfig().audit.enabled) return null;
  const entry: AuditEntry = {
    entry_id: randomUUID(),
    action, actor, target_type: targetType, target_id: targetId,
    details, timestamp: new Date().toISOString(),
    correlation_id: correlationId ?? randomUUID(),
  };
  // Auditing never fails the operation being audited.
  try {
    mkdirSync(auditDir(), { recursive: true });
    const file = auditFile();
    const h = hashEntry(entry, previousHash(file));
    appendFileSync(file, JSON.stringify({ ...entry, h }) + '\n');
    tail = { file, h };
    return entry;
  } catch (err) {
    log.error({ err, action }, 'Audit write failed');
    return null;
  }
}

export function queryAuditLog(filters: {
  action?: AuditAction; actor?: string; target_type?: string;
  target_id?: string; correlation_id?: string;
  since?: string; until?: string; limit?: number;
}): AuditEntry[] {
  const { since, until } = filters;
  let entries = readLines().map(stripHash);

  if (filters.action) entries = entries.filter((e) => e.action === filters.action);
  if (filters.actor) entries = entries.filter((e) => e.actor === filters.actor);
  if (filters.target_type) entries = entries.filter((e) => e.target_type === filters.target_type);
  if (filters.target_id) entries = entries.filter((e) => e.target_id === filters.target_id);
  if (filters.correlation_id) entries = entries.filter((e) => e.correlation_id === filters.correlation_id);
  if (since) entries = entries.filter((e) => e.timestamp >= since);
  if (until) entries = entries.filter((e) => e.timestamp <= until);

  entries.reverse();
  return entries.slice(0, filters.limit ?? 100);
}

export function getAuditStats(): { total_entries: number; actions_breakdown: Record<string, number>; recent_24h: number } {
  const entries = readLines();
  const since24h = new Date(Date.now() - 86400000).toISOString();
  const breakdown: Record<string, number> = {};
  let recent = 0;
  for (const e of entries) {
    breakdown[e.action] = (breakdown[e.action] ?? 0) + 1;
    if (e.timestamp >= since24h) recent++;
  }
  return { total_entries: entries.length, actions_breakdown: breakdown, recent_24h: recent };
}

/** Walk the chain; returns the index of the first line whose hash does not match. */
export function verifyAuditChain(): { valid: boolean; entries: number; broken_at: number | null } {
  const lines = readLines();
  let prev = GENESIS;
  for (let i = 0; i < lines.length; i++) {
    if (hashEntry(stripHash(lines[i]), prev) !== lines[i].h) {
      return { valid: false, entries: lines.length, broken_at: i };
    }
    prev = lines[i].h;
  }
  return { valid: true, entries: lines.length, broken_at: null };
}
