/**
 * Request and response constructors.
 */

import { randomUUID } from 'node:crypto';
import type { ErrorCode } from '../errors.js';
import type {
  ConsultationRequest, ContextValue, GuidanceResponse, RequestPriority, ResponseStatus,
} from '../types/index.js';

export interface RequestInput {
  domain: string;
  query: string;
  context?: Record<string, ContextValue>;
  request_id?: string;
  requester_id?: string;
  priority?: RequestPriority;
}

export function createRequest(input: RequestInput): ConsultationRequest {
  return Object.freeze({
    request_id: input.request_id ?? randomUUID(),
    domain: input.domain,
    query: input.query,
    context: Object.freeze({ ...(input.context ?? {}) }),
    requester_id: input.requester_id ?? 'system',
    timestamp: new Date().toISOString(),
    priority: input.priority ?? 'NORMAL',
  });
}

export function successResponse(
  requestId: string, agentId: string, guidance: string, confidence: number,
  recommendations: string[], processingTimeMs: number,
  status: Extract<ResponseStatus, 'SUCCESS' | 'PARTIAL_SUCCESS'> = 'SUCCESS',
  metadata: Record<string, unknown> = {},
): GuidanceResponse {
  return {
    response_id: randomUUID(),
    request_id: requestId,
    agent_id: agentId,
    guidance,
    confidence: Math.min(1, Math.max(0, confidence)),
    recommendations: [...recommendations],
    processing_time_ms: processingTimeMs,
    timestamp: new Date().toISOString(),
    status,
    metadata,
  };
}

export function failureResponse(
  requestId: string, agentId: string, message: string, code: ErrorCode,
  processingTimeMs = 0,
): GuidanceResponse {
  return {
    response_id: randomUUID(),
    request_id: requestId,
    agent_id: agentId,
    guidance: message,
    confidence: 0,
    recommendations: [],
    processing_time_ms: processingTimeMs,
    timestamp: new Date().toISOString(),
    status: 'FAILURE',
    metadata: { error: true, error_code: code },
  };
}

export function isSuccessful(response: GuidanceResponse): boolean {
  return response.status === 'SUCCESS' || response.status === 'PARTIAL_SUCCESS';
}
