import {
  REGISTRATION_STATUSES,
  type RegistrationStatus,
  type TeamRegistration,
  type TeamRegistrationDetails,
  type TeamRegistrationFilter
} from '../domain/teamRegistration';
import { planTransition, type EvaluationDecision, type RegistrationAction } from '../domain/registrationStateMachine';
import { ApiError, StoreError, notFoundAsNull } from '../errors';
import type { PageRequest, TeamRegistrationStore, UserStore } from '../stores/types';
import type { TokenClaims } from './authService';

export const ALLOCATED_TEAMS_LIMIT = 100;

export type RegistrationStats = Record<RegistrationStatus | 'total', number>;

// The unique index catches a name taken between the pre-check and the write.
async function teamNameConflict<T>(write: Promise<T>): Promise<T> {
  try {
    return await write;
  } catch (error) {
    if (error instanceof StoreError && error.kind === 'duplicate' && error.field === 'teamName') {
      throw new ApiError('conflict', 'Team name already exists', { cause: error });
    }
    throw error;
  }
}

export class TeamRegistrationService {
  constructor(
    private readonly registrations: TeamRegistrationStore,
    private readonly users: UserStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async submit(details: TeamRegistrationDetails): Promise<TeamRegistration> {
    if (await this.teamNameTaken(details.teamName)) {
      throw new ApiError('conflict', 'Team name already exists');
    }

    return teamNameConflict(
      this.registrations.create({
        ...details,
        registrationStatus: 'pending',
        submittedAt: this.now()
      })
    );
  }

  getById(id: string): Promise<TeamRegistration> {
    return this.registrations.getById(id);
  }

  getByRegistrationNumber(registrationNumber: string): Promise<TeamRegistration> {
    return this.registrations.getByRegistrationNumber(registrationNumber);
  }

  getByTeamId(teamId: string): Promise<TeamRegistration> {
    return this.registrations.getByTeamId(teamId);
  }

  async list(filter: TeamRegistrationFilter, page: PageRequest): Promise<{ teams: TeamRegistration[]; total: number }> {
    const [teams, total] = await Promise.all([
      this.registrations.list(filter, page),
      this.registrations.count(filter)
    ]);
    return { teams, total };
  }

  async stats(): Promise<RegistrationStats> {
    const [total, ...byStatus] = await Promise.all([
      this.registrations.count(),
      ...REGISTRATION_STATUSES.map((status) => this.registrations.count({ status }))
    ]);

    const stats: RegistrationStats = { total, pending: 0, approved: 0, rejected: 0 };
    REGISTRATION_STATUSES.forEach((status, index) => {
      stats[status] = byStatus[index] ?? 0;
    });
    return stats;
  }

  async edit(id: string, fields: Partial<TeamRegistrationDetails>): Promise<TeamRegistration> {
    const current = await this.registrations.getById(id);

    if (fields.teamName !== undefined && fields.teamName !== current.teamName) {
      if (await this.teamNameTaken(fields.teamName)) {
        throw new ApiError('conflict', 'Team name already exists');
      }
    }

    return teamNameConflict(this.apply(current, { type: 'edit', fields }));
  }

  async act(id: string, action: EvaluationDecision, actor: string, reason?: string): Promise<TeamRegistration> {
    const current = await this.registrations.getById(id);
    return this.apply(
      current,
      action === 'approve' ? { type: 'approve', actor } : { type: 'reject', actor, reason: reason ?? '' }
    );
  }

  async allocate(id: string, judgeId: string): Promise<TeamRegistration> {
    const current = await this.registrations.getById(id);

    const judge = await notFoundAsNull(this.users.getById(judgeId));
    if (!judge) {
      throw new ApiError('not_found', 'Judge not found');
    }
    if (judge.role !== 'judge') {
      throw new ApiError('validation', 'User is not a judge');
    }

    return this.apply(current, { type: 'allocate', judgeId: judge.id });
  }

  async listAllocated(judgeId: string): Promise<TeamRegistration[]> {
    return this.registrations.list({ allocatedJudgeId: judgeId }, { limit: ALLOCATED_TEAMS_LIMIT, offset: 0 });
  }

  async evaluate(
    id: string,
    judge: TokenClaims,
    decision: EvaluationDecision,
    reason?: string
  ): Promise<TeamRegistration> {
    const current = await this.registrations.getById(id);
    return this.apply(current, {
      type: 'evaluate',
      judgeId: judge.id,
      actor: judge.username,
      decision,
      reason
    });
  }

  async delete(id: string): Promise<void> {
    await this.registrations.delete(id);
  }

  private async apply(current: TeamRegistration, action: RegistrationAction): Promise<TeamRegistration> {
    const plan = planTransition(current, action, this.now());
    if (plan.kind === 'unchanged') {
      return current;
    }
    return this.registrations.update(current.id, plan.patch);
  }

  private async teamNameTaken(teamName: string): Promise<boolean> {
    return (await notFoundAsNull(this.registrations.getByTeamName(teamName))) !== null;
  }
}
