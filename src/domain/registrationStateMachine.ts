import { ApiError } from '../errors';
import {
  isApproved,
  isRejected,
  type TeamRegistration,
  type TeamRegistrationDetails,
  type TeamRegistrationPatch
} from './teamRegistration';

export type EvaluationDecision = 'approve' | 'reject';

export type RegistrationAction =
  | { type: 'approve'; actor: string }
  | { type: 'reject'; actor: string; reason: string }
  | { type: 'allocate'; judgeId: string }
  | { type: 'evaluate'; judgeId: string; actor: string; decision: EvaluationDecision; reason?: string }
  | { type: 'edit'; fields: Partial<TeamRegistrationDetails> };

export type TransitionPlan = { kind: 'unchanged' } | { kind: 'patch'; patch: TeamRegistrationPatch };

export const MAX_REJECTION_REASON_LENGTH = 500;

const UNCHANGED: TransitionPlan = { kind: 'unchanged' };

function planApprove(registration: TeamRegistration, actor: string, now: Date): TransitionPlan {
  if (isApproved(registration)) {
    return UNCHANGED;
  }
  if (isRejected(registration)) {
    throw new ApiError('conflict', 'Team registration has already been rejected');
  }
  return {
    kind: 'patch',
    patch: { registrationStatus: 'approved', approvedAt: now, actionedBy: actor }
  };
}

function planReject(registration: TeamRegistration, actor: string, reason: string, now: Date): TransitionPlan {
  const trimmed = reason.trim();
  if (!trimmed) {
    throw new ApiError('validation', 'Rejection reason is required');
  }
  if (trimmed.length > MAX_REJECTION_REASON_LENGTH) {
    throw new ApiError('validation', `Rejection reason must be at most ${MAX_REJECTION_REASON_LENGTH} characters`);
  }

  if (isRejected(registration)) {
    return UNCHANGED;
  }
  if (isApproved(registration)) {
    throw new ApiError('conflict', 'Team registration has already been approved');
  }
  return {
    kind: 'patch',
    patch: { registrationStatus: 'rejected', rejectedAt: now, rejectionReason: trimmed, actionedBy: actor }
  };
}

/**
 * Decides what a registration action changes. Status only ever moves
 * pending -> approved or pending -> rejected; repeating the transition that
 * already happened is a no-op, the opposite one is a conflict.
 */
export function planTransition(
  registration: TeamRegistration,
  action: RegistrationAction,
  now: Date = new Date()
): TransitionPlan {
  switch (action.type) {
    case 'approve':
      return planApprove(registration, action.actor, now);
    case 'reject':
      return planReject(registration, action.actor, action.reason, now);
    case 'allocate':
      if (registration.allocatedJudgeId === action.judgeId) {
        return UNCHANGED;
      }
      return { kind: 'patch', patch: { allocatedJudgeId: action.judgeId } };
    case 'evaluate':
      if (registration.allocatedJudgeId !== action.judgeId) {
        throw new ApiError('forbidden', 'Team is not allocated to you');
      }
      return action.decision === 'approve'
        ? planApprove(registration, action.actor, now)
        : planReject(registration, action.actor, action.reason ?? '', now);
    case 'edit':
      if (Object.keys(action.fields).length === 0) {
        throw new ApiError('validation', 'No valid fields to update');
      }
      return { kind: 'patch', patch: { ...action.fields } };
  }
}
